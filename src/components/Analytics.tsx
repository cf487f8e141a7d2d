import { useState, useEffect, useCallback } from 'react';
import { ChevronLeft, ChevronRight, Calendar, Clock } from 'lucide-react';
import { addWeeks, subWeeks, format, min } from 'date-fns';
import { useAppStore } from '@/store/useAppStore';
import { analyticsService, type PeriodAnalytics } from '@/lib/analyticsService';
import type { GoalWeekSummary } from '@/lib/weekStore';
import { weekBounds } from '@/lib/date-utils';
import { formatHourMinute } from '@/lib/time-format';
import { AnalyticsWidgets } from './analytics/AnalyticsWidgets';
import { EmptyState } from './analytics/EmptyState';
import { ErrorState } from './analytics/ErrorState';
import { Button } from './ui/button';

interface AnalyticsData {
  weekAnalytics: PeriodAnalytics;
  goalTotals: GoalWeekSummary[];
  sparklineData: number[];
}

export function Analytics() {
  const { goals, settings, setActiveTab } = useAppStore();
  const [currentWeek, setCurrentWeek] = useState(new Date());
  const [analyticsData, setAnalyticsData] = useState<AnalyticsData | null>(null);
  const [isLoading, setIsLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [lastUpdated, setLastUpdated] = useState<Date | null>(null);

  const loadAnalytics = useCallback(async () => {
    try {
      setIsLoading(true);
      setError(null);

      const { end } = weekBounds(currentWeek, settings.weekStartDay);
      const lastDay = min([end, new Date()]);
      const [weekAnalytics, goalTotals, sparklineData] = await Promise.all([
        analyticsService.getWeekAnalytics(currentWeek, goals),
        analyticsService.getGoalWeekTotals(currentWeek, goals),
        analyticsService.getSparklineData(lastDay, 7, goals)
      ]);

      setAnalyticsData({ weekAnalytics, goalTotals, sparklineData });
      setLastUpdated(new Date());
    } catch (err) {
      console.error('Failed to load analytics:', err);
      setError(err instanceof Error ? err.message : 'Failed to load analytics data');
    } finally {
      setIsLoading(false);
    }
  }, [currentWeek, goals, settings.weekStartDay]);

  useEffect(() => {
    void loadAnalytics();
  }, [loadAnalytics]);

  useEffect(() => {
    const handleDataChange = () => {
      void loadAnalytics();
    };

    window.addEventListener('dayDataChanged', handleDataChange);
    return () => window.removeEventListener('dayDataChanged', handleDataChange);
  }, [loadAnalytics]);

  const handleRetry = () => {
    analyticsService.clearCache();
    void loadAnalytics();
  };

  if (error && !isLoading) {
    return <ErrorState error={error} onRetry={handleRetry} />;
  }

  if (!isLoading && analyticsData?.weekAnalytics.activeDays === 0 && analyticsData.weekAnalytics.streakInfo.longestStreak === 0) {
    return <EmptyState onStartTracking={() => setActiveTab('today')} />;
  }

  const { start, end } = weekBounds(currentWeek, settings.weekStartDay);

  return (
    <div className="h-full flex flex-col">
      <div className="p-6 border-b">
        <div className="flex items-center justify-between mb-4">
          <div>
            <h2 className="text-2xl font-bold">Analytics</h2>
            <p className="text-muted-foreground">Time tracked against your weekly targets</p>
          </div>

          {lastUpdated && (
            <div className="flex items-center space-x-2 text-sm text-muted-foreground">
              <Clock className="h-4 w-4" />
              <span>Updated {format(lastUpdated, 'h:mm a')}</span>
            </div>
          )}
        </div>

        <div className="flex items-center space-x-4">
          <Button
            variant="outline"
            size="icon"
            onClick={() => setCurrentWeek(prev => subWeeks(prev, 1))}
            aria-label="Previous week"
          >
            <ChevronLeft className="h-4 w-4" />
          </Button>
          <div className="flex items-center space-x-2">
            <Calendar className="h-4 w-4 text-muted-foreground" />
            <h3 className="text-lg font-semibold">
              {format(start, 'MMM d')} – {format(end, 'MMM d, yyyy')}
            </h3>
          </div>
          <Button
            variant="outline"
            size="icon"
            onClick={() => setCurrentWeek(prev => addWeeks(prev, 1))}
            aria-label="Next week"
          >
            <ChevronRight className="h-4 w-4" />
          </Button>
        </div>
      </div>

      <div className="flex-1 p-6 overflow-auto space-y-6">
        {analyticsData && (
          <AnalyticsWidgets
            periodAnalytics={analyticsData.weekAnalytics}
            sparklineData={analyticsData.sparklineData}
            isLoading={isLoading}
          />
        )}

        {analyticsData && analyticsData.goalTotals.length > 0 && (
          <div className="border rounded-lg bg-card divide-y">
            {analyticsData.goalTotals.map(summary => (
              <div key={summary.goalId} className="flex items-center justify-between px-4 py-3">
                <span className="font-medium">{summary.title}</span>
                <span className="text-sm tabular-nums text-muted-foreground">
                  {formatHourMinute(summary.trackedSeconds)} / {formatHourMinute(summary.weeklyTarget)}
                </span>
              </div>
            ))}
          </div>
        )}
      </div>
    </div>
  );
}
