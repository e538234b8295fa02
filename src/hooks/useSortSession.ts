/**
 * SortSession Hook
 * Owns the number grid for one browser session: the backing sequence, the
 * alternating sort direction and the single in-flight animation.
 *
 * Reseeding or resetting aborts a running sort before the sequence is
 * replaced, so a run never writes into the array the grid shows next.
 */

import { useCallback, useEffect, useRef, useState } from 'react';
import type { RandomSource } from '@/lib/random';
import type { SelectionError, ParseResult, SortDirection, SortRunResult } from '@/components/sorter/types';
import { generateSequence } from '@/components/sorter/engine/generateSequence';
import { INITIAL_DIRECTION, flipDirection } from '@/components/sorter/engine/direction';
import { runAnimatedSort, type Sleep } from '@/components/sorter/engine/runAnimatedSort';
import { checkReseedSelection } from '@/components/sorter/engine/selection';
import { SWAP_DELAY_MS } from '@/components/sorter/engine/constants';

export interface SortSessionOptions {
  random?: RandomSource;
  delayMs?: number;
  sleep?: Sleep;
}

export interface SortSession {
  sequence: number[];
  direction: SortDirection;
  isSorting: boolean;
  swapCount: number;
  lastSwap: [number, number] | null;
  start: (count: number) => void;
  sort: () => Promise<SortRunResult | null>;
  selectValue: (value: number) => ParseResult<SelectionError>;
  reset: () => void;
}

export function useSortSession({
  random = Math.random,
  delayMs = SWAP_DELAY_MS,
  sleep,
}: SortSessionOptions = {}): SortSession {
  const [sequence, setSequence] = useState<number[]>([]);
  const [direction, setDirection] = useState<SortDirection>(INITIAL_DIRECTION);
  const [isSorting, setIsSorting] = useState(false);
  const [swapCount, setSwapCount] = useState(0);
  const [lastSwap, setLastSwap] = useState<[number, number] | null>(null);

  // The run reads and writes these directly; state only mirrors them for rendering.
  const sequenceRef = useRef<number[]>([]);
  const directionRef = useRef<SortDirection>(INITIAL_DIRECTION);
  const controllerRef = useRef<AbortController | null>(null);

  const cancel = useCallback(() => {
    const controller = controllerRef.current;
    if (!controller) return;

    controllerRef.current = null;
    controller.abort();
    setIsSorting(false);
    setLastSwap(null);
  }, []);

  useEffect(() => cancel, [cancel]);

  const start = useCallback(
    (count: number) => {
      cancel();
      const next = generateSequence(count, random);
      sequenceRef.current = next;
      setSequence([...next]);
      setSwapCount(0);
    },
    [cancel, random]
  );

  const sort = useCallback(async (): Promise<SortRunResult | null> => {
    if (controllerRef.current || sequenceRef.current.length === 0) return null;

    const controller = new AbortController();
    controllerRef.current = controller;
    setIsSorting(true);
    setSwapCount(0);

    try {
      const result = await runAnimatedSort(sequenceRef.current, directionRef.current, {
        delayMs,
        sleep,
        signal: controller.signal,
        onSwap: ({ i, j, sequence: live }) => {
          setSequence([...live]);
          setLastSwap([i, j]);
          setSwapCount((c) => c + 1);
        },
      });

      if (result.status === 'completed') {
        directionRef.current = flipDirection(result.direction);
        setDirection(directionRef.current);
      } else {
        console.info('Sort cancelled after', result.swaps, 'swaps');
      }
      return result;
    } catch (err) {
      console.error('Sort run failed:', err);
      return null;
    } finally {
      if (controllerRef.current === controller) {
        controllerRef.current = null;
        setIsSorting(false);
        setLastSwap(null);
      }
    }
  }, [delayMs, sleep]);

  const selectValue = useCallback(
    (value: number) => {
      const selection = checkReseedSelection(value);
      if (selection.ok) start(selection.value);
      return selection;
    },
    [start]
  );

  const reset = useCallback(() => {
    cancel();
    sequenceRef.current = [];
    setSequence([]);
    setSwapCount(0);
  }, [cancel]);

  return { sequence, direction, isSorting, swapCount, lastSwap, start, sort, selectValue, reset };
}
