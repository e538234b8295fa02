import type { ReactNode } from 'react';
import { Navigate } from 'react-router-dom';
import { useSortSessionContext } from '@/context/SortSessionContext';

interface SequenceRouteProps {
  children: ReactNode;
}

// The sort screen has nothing to show until a count has been entered.
export const SequenceRoute = ({ children }: SequenceRouteProps) => {
  const { sequence } = useSortSessionContext();

  if (sequence.length === 0) {
    return <Navigate to="/" replace />;
  }

  return <>{children}</>;
};
