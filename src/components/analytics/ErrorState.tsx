import { AlertCircle, RefreshCw } from 'lucide-react';
import { Button } from '../ui/button';

interface ErrorStateProps {
  title?: string;
  error: string;
  onRetry: () => void;
}

export function ErrorState({ title = 'Unable to Load Analytics', error, onRetry }: ErrorStateProps) {
  return (
    <div className="flex items-center justify-center h-full min-h-[400px]">
      <div className="text-center max-w-md px-8">
        <div className="mb-6">
          <AlertCircle className="h-16 w-16 mx-auto text-red-500 opacity-75" />
        </div>

        <h2 className="text-2xl font-semibold mb-3">{title}</h2>

        <div className="bg-red-50 border border-red-200 rounded-lg p-3 mb-6">
          <p className="text-sm text-red-700 font-mono">
            {error}
          </p>
        </div>

        <Button onClick={onRetry} variant="outline" className="w-full">
          <RefreshCw className="h-4 w-4 mr-2" />
          Try Again
        </Button>
      </div>
    </div>
  );
}
