import { useEffect, useState } from 'react';
import { TrendingUp } from 'lucide-react';
import type { Goal } from '@/lib/types';
import { analyticsService } from '@/lib/analyticsService';
import { formatHourMinute } from '@/lib/time-format';
import { Sparkline } from './Sparkline';

interface WeeklySparklineProps {
  goals: Goal[];
  // Changes whenever tracked time changes so the series reloads
  refreshKey?: string;
}

export function WeeklySparkline({ goals, refreshKey }: WeeklySparklineProps) {
  const [minutes, setMinutes] = useState<number[]>([]);

  useEffect(() => {
    let cancelled = false;
    analyticsService.getSparklineData(new Date(), 7, goals)
      .then(data => {
        if (!cancelled) setMinutes(data);
      })
      .catch(error => console.error('Failed to load sparkline data:', error));
    return () => {
      cancelled = true;
    };
  }, [goals, refreshKey]);

  const total = minutes.reduce((sum, value) => sum + value, 0);

  return (
    <div className="flex items-center gap-3">
      <TrendingUp className="h-4 w-4 text-purple-600" />
      <div>
        <div className="text-xs text-muted-foreground">Last 7 days</div>
        <div className="text-sm font-medium">{formatHourMinute(total * 60)}</div>
      </div>
      <Sparkline data={minutes} width={80} height={24} color="#8b5cf6" showDots />
    </div>
  );
}
