import { BarChart3, Timer } from 'lucide-react';
import { Button } from '../ui/button';

interface EmptyStateProps {
  onStartTracking: () => void;
}

export function EmptyState({ onStartTracking }: EmptyStateProps) {
  return (
    <div className="flex items-center justify-center h-full min-h-[400px]">
      <div className="text-center max-w-md px-8">
        <div className="mb-6">
          <BarChart3 className="h-16 w-16 mx-auto text-muted-foreground opacity-50" />
        </div>

        <h2 className="text-2xl font-semibold mb-3">No tracked time yet</h2>

        <p className="text-muted-foreground mb-6 leading-relaxed">
          Start a session on any goal and your weekly totals and streaks will show up here.
        </p>

        <Button onClick={onStartTracking} className="w-full">
          <Timer className="h-4 w-4 mr-2" />
          Go to Today
        </Button>
      </div>
    </div>
  );
}
