import { useState } from "react";
import { useNavigate } from "react-router-dom";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { CountForm } from "@/components/sorter/ui/CountForm";
import { NoticeDialog, type Notice } from "@/components/sorter/ui/NoticeDialog";
import { parseCount } from "@/components/sorter/engine/selection";
import { useSortSessionContext } from "@/context/SortSessionContext";

export default function Intro() {
  const { start } = useSortSessionContext();
  const navigate = useNavigate();
  const [notice, setNotice] = useState<Notice | null>(null);

  const handleCount = (raw: string) => {
    const parsed = parseCount(raw);
    if (!parsed.ok) {
      setNotice({ kind: "error", title: "Invalid Input", message: parsed.message });
      return;
    }

    start(parsed.value);
    navigate("/sort");
  };

  return (
    <div className="flex min-h-screen items-center justify-center p-6">
      <Card className="w-full max-w-sm">
        <CardHeader>
          <CardTitle className="text-base">Number Sorter</CardTitle>
        </CardHeader>
        <CardContent>
          <CountForm onSubmit={handleCount} />
        </CardContent>
      </Card>

      <NoticeDialog notice={notice} onClose={() => setNotice(null)} />
    </div>
  );
}
