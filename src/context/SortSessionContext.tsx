import { createContext, useContext, type ReactNode } from 'react';
import { useSortSession, type SortSession, type SortSessionOptions } from '@/hooks/useSortSession';

const SortSessionContext = createContext<SortSession | null>(null);

interface SortSessionProviderProps extends SortSessionOptions {
  children: ReactNode;
}

export const SortSessionProvider = ({ children, ...options }: SortSessionProviderProps) => {
  const session = useSortSession(options);
  return <SortSessionContext.Provider value={session}>{children}</SortSessionContext.Provider>;
};

export function useSortSessionContext(): SortSession {
  const session = useContext(SortSessionContext);
  if (!session) {
    throw new Error('useSortSessionContext must be used within a SortSessionProvider');
  }
  return session;
}
