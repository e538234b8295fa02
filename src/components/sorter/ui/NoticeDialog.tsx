import {
  AlertDialog,
  AlertDialogAction,
  AlertDialogContent,
  AlertDialogDescription,
  AlertDialogFooter,
  AlertDialogHeader,
  AlertDialogTitle,
} from "@/components/ui/alert-dialog";
import { AlertTriangle, XCircle } from "lucide-react";
import { cn } from "@/lib/utils";

export type Notice = {
  kind: "error" | "warning";
  title: string;
  message: string;
};

type NoticeDialogProps = {
  notice: Notice | null;
  onClose: () => void;
};

/** Blocking message box; does not touch any sort in progress. */
export function NoticeDialog({ notice, onClose }: NoticeDialogProps) {
  const Icon = notice?.kind === "warning" ? AlertTriangle : XCircle;

  return (
    <AlertDialog
      open={notice !== null}
      onOpenChange={(open) => {
        if (!open) onClose();
      }}
    >
      <AlertDialogContent>
        <AlertDialogHeader>
          <AlertDialogTitle className="flex items-center gap-2">
            <Icon className={cn("h-5 w-5", notice?.kind === "warning" ? "text-amber-500" : "text-destructive")} />
            {notice?.title}
          </AlertDialogTitle>
          <AlertDialogDescription>{notice?.message}</AlertDialogDescription>
        </AlertDialogHeader>
        <AlertDialogFooter>
          <AlertDialogAction onClick={onClose}>OK</AlertDialogAction>
        </AlertDialogFooter>
      </AlertDialogContent>
    </AlertDialog>
  );
}
