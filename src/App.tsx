import { SequenceRoute } from "@/components/SequenceRoute";
import { SortSessionProvider } from "@/context/SortSessionContext";
import { RANDOM_SEED, SWAP_DELAY_MS } from "@/configs/environment";
import { createSeededRandom } from "@/lib/random";
import Intro from "@/pages/Intro";
import Sorter from "@/pages/Sorter";
import { BrowserRouter, Navigate, Route, Routes } from "react-router-dom";

const random = RANDOM_SEED === undefined ? Math.random : createSeededRandom(RANDOM_SEED);

export const AppRoutes = () => (
  <div className="min-h-screen bg-background">
    <Routes>
      <Route path="/" element={<Intro />} />
      <Route path="/sort" element={
        <SequenceRoute>
          <Sorter />
        </SequenceRoute>
      } />
      <Route path="*" element={<Navigate to="/" replace />} />
    </Routes>
  </div>
);

const App = () => (
  <BrowserRouter>
    <SortSessionProvider random={random} delayMs={SWAP_DELAY_MS}>
      <AppRoutes />
    </SortSessionProvider>
  </BrowserRouter>
);

export default App;
