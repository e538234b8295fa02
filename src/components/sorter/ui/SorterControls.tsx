import { Button } from "@/components/ui/button";
import { ArrowDown, ArrowUp, Play, RotateCcw } from "lucide-react";
import type { SortDirection } from "../types";

type SorterControlsProps = {
  isSorting: boolean;
  direction: SortDirection;
  swapCount: number;
  onSort: () => void;
  onReset: () => void;
};

export function SorterControls({ isSorting, direction, swapCount, onSort, onReset }: SorterControlsProps) {
  const DirectionIcon = direction === "descending" ? ArrowDown : ArrowUp;

  return (
    <div className="flex flex-col gap-3 w-40">
      <Button onClick={onSort} disabled={isSorting}>
        <Play className="h-4 w-4" />
        Sort
      </Button>
      <Button variant="secondary" onClick={onReset}>
        <RotateCcw className="h-4 w-4" />
        Reset
      </Button>

      <div className="mt-2 space-y-1 text-sm text-muted-foreground">
        <div className="flex items-center gap-1.5" data-testid="sort-direction">
          <DirectionIcon className="h-3.5 w-3.5" />
          {isSorting ? "Sorting" : "Next"}: {direction}
        </div>
        <div data-testid="swap-count">Swaps: {swapCount}</div>
      </div>
    </div>
  );
}
