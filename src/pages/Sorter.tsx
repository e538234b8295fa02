import { useState } from "react";
import { useNavigate } from "react-router-dom";
import { Card, CardContent } from "@/components/ui/card";
import { NumberGrid } from "@/components/sorter/ui/NumberGrid";
import { SorterControls } from "@/components/sorter/ui/SorterControls";
import { NoticeDialog, type Notice } from "@/components/sorter/ui/NoticeDialog";
import { useSortSessionContext } from "@/context/SortSessionContext";

export default function Sorter() {
  const session = useSortSessionContext();
  const navigate = useNavigate();
  const [notice, setNotice] = useState<Notice | null>(null);

  const handleSelect = (value: number) => {
    const selection = session.selectValue(value);
    if (!selection.ok) {
      setNotice({ kind: "warning", title: "Invalid Selection", message: selection.message });
    }
  };

  return (
    <div className="flex min-h-screen gap-5 p-3">
      <Card className="flex-1 overflow-auto">
        <CardContent className="p-4">
          <NumberGrid values={session.sequence} swapping={session.lastSwap} onSelect={handleSelect} />
        </CardContent>
      </Card>

      <div className="flex items-center">
        <SorterControls
          isSorting={session.isSorting}
          direction={session.direction}
          swapCount={session.swapCount}
          onSort={() => {
            void session.sort();
          }}
          onReset={() => {
            session.reset();
            navigate("/");
          }}
        />
      </div>

      <NoticeDialog notice={notice} onClose={() => setNotice(null)} />
    </div>
  );
}
