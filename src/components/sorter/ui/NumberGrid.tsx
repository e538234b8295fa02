import { motion } from "framer-motion";
import { Button } from "@/components/ui/button";
import { cn } from "@/lib/utils";

const ROWS = 10;

type NumberGridProps = {
  values: number[];
  swapping?: [number, number] | null;
  onSelect: (value: number) => void;
};

function isHighlighted(i: number, pair?: [number, number] | null) {
  return !!pair && (i === pair[0] || i === pair[1]);
}

/** Ten rows, as many columns as that takes; cells fill row by row. */
export function gridColumns(count: number) {
  return Math.max(1, Math.ceil(count / ROWS));
}

export function NumberGrid({ values, swapping, onSelect }: NumberGridProps) {
  return (
    <div
      role="group"
      aria-label="Numbers"
      className="grid grid-flow-row gap-1.5 overflow-x-auto p-1"
      style={{ gridTemplateColumns: `repeat(${gridColumns(values.length)}, minmax(3.5rem, 1fr))` }}
    >
      {values.map((v, i) => {
        const isSwap = isHighlighted(i, swapping);

        return (
          <motion.div key={i} animate={{ scale: isSwap ? 1.08 : 1 }} transition={{ duration: 0.08 }}>
            <Button
              variant="tile"
              size="sm"
              className={cn("w-full font-mono tabular-nums", isSwap && "ring-2 ring-primary")}
              onClick={() => onSelect(v)}
            >
              {v}
            </Button>
          </motion.div>
        );
      })}
    </div>
  );
}
