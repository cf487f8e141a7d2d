import { Calendar, CheckSquare, Clock, Flame } from 'lucide-react';
import { Sparkline } from '../charts/Sparkline';
import type { PeriodAnalytics } from '@/lib/analyticsService';
import { formatHourMinute } from '@/lib/time-format';

interface AnalyticsWidgetsProps {
  periodAnalytics: PeriodAnalytics;
  sparklineData: number[]; // tracked minutes per day
  isLoading?: boolean;
}

export function AnalyticsWidgets({
  periodAnalytics,
  sparklineData,
  isLoading = false
}: AnalyticsWidgetsProps) {
  if (isLoading) {
    return (
      <div className="grid grid-cols-2 gap-4">
        {[1, 2, 3, 4].map(i => (
          <div key={i} className="p-4 border rounded-lg bg-card animate-pulse">
            <div className="h-4 bg-gray-200 rounded mb-2"></div>
            <div className="h-8 bg-gray-200 rounded mb-2"></div>
            <div className="h-3 bg-gray-200 rounded"></div>
          </div>
        ))}
      </div>
    );
  }

  const { streakInfo } = periodAnalytics;

  return (
    <div className="grid grid-cols-2 gap-4">
      <div className="p-4 border rounded-lg bg-card">
        <div className="flex items-center space-x-2 mb-2">
          <Clock className="h-4 w-4 text-purple-600" />
          <h3 className="font-semibold text-sm">Tracked</h3>
        </div>
        <div className="flex items-end justify-between">
          <div className="text-2xl font-bold">{formatHourMinute(periodAnalytics.trackedSeconds)}</div>
          <Sparkline data={sparklineData} width={60} height={20} color="#8b5cf6" />
        </div>
      </div>

      <div className="p-4 border rounded-lg bg-card">
        <div className="flex items-center space-x-2 mb-2">
          <CheckSquare className="h-4 w-4 text-green-600" />
          <h3 className="font-semibold text-sm">Daily Targets Met</h3>
        </div>
        <div className="text-2xl font-bold mb-1">{periodAnalytics.completionRate}%</div>
        <div className="text-xs text-muted-foreground">average across tracked days</div>
      </div>

      <div className="p-4 border rounded-lg bg-card">
        <div className="flex items-center space-x-2 mb-2">
          <Flame className="h-4 w-4 text-orange-600" />
          <h3 className="font-semibold text-sm">Current Streak</h3>
        </div>
        <div className="text-2xl font-bold mb-1">{streakInfo.currentStreak}</div>
        <div className="text-xs text-muted-foreground">
          {streakInfo.currentStreak === 1 ? 'day' : 'days'}
          {streakInfo.longestStreak > 0 && ` • Best: ${streakInfo.longestStreak}`}
        </div>
      </div>

      <div className="p-4 border rounded-lg bg-card">
        <div className="flex items-center space-x-2 mb-2">
          <Calendar className="h-4 w-4 text-blue-600" />
          <h3 className="font-semibold text-sm">Active Days</h3>
        </div>
        <div className="text-2xl font-bold mb-1">{periodAnalytics.activeDays}</div>
        <div className="text-xs text-muted-foreground">of {periodAnalytics.totalDays} days</div>
      </div>
    </div>
  );
}
