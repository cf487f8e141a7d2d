import { useEffect, useCallback, useMemo, useState } from 'react'
import { format } from 'date-fns'
import { BarChart3, CalendarCheck, Search, Settings as SettingsIcon, Sparkles, Timer, X } from 'lucide-react'
import { useAppStore, type AppTab } from './store/useAppStore'
import { useGlobalKeyboard } from './hooks/useGlobalKeyboard'
import { useSessionTimer } from './hooks/useSessionTimer'
import {
  buildAvailableFilters,
  buildSessionEntries,
  createScoreFn,
  filterId,
  filterSessions,
  getRecommendedSessions,
  glanceList,
  glanceOverflow
} from './lib/sessionFilterService'
import { SessionRow } from './components/SessionRow'
import { FilterBar } from './components/FilterBar'
import { NowPlayingBar } from './components/NowPlayingBar'
import { NewGoalForm } from './components/NewGoalForm'
import { GlobalSearch } from './components/GlobalSearch'
import { Analytics } from './components/Analytics'
import { Settings } from './components/Settings'
import { WeeklySparkline } from './components/charts/WeeklySparkline'
import { Button } from './components/ui/button'

const TABS: { id: AppTab; label: string; icon: typeof Timer }[] = [
  { id: 'today', label: 'Today', icon: Timer },
  { id: 'analytics', label: 'Analytics', icon: BarChart3 },
  { id: 'settings', label: 'Settings', icon: SettingsIcon }
]

function App() {
  const {
    day,
    weekDays,
    goals,
    tags,
    plan,
    settings,
    selectedFilterId,
    activeTab,
    isSearchOpen,
    isLoading,
    error,
    initialize,
    reloadGoals,
    toggleTimer,
    pauseTimer,
    resumeTimer,
    stopTimer,
    skipSession,
    markDone,
    logManual,
    planDay,
    setSelectedFilterId,
    setActiveTab,
    setSearchOpen,
    clearError
  } = useAppStore()
  const timer = useSessionTimer()
  const [showAllToday, setShowAllToday] = useState(false)

  useEffect(() => {
    void initialize()
  }, [initialize])

  useEffect(() => {
    const handleGoalsChanged = () => {
      void reloadGoals()
    }
    window.addEventListener('goalsChanged', handleGoalsChanged)
    return () => window.removeEventListener('goalsChanged', handleGoalsChanged)
  }, [reloadGoals])

  const entries = useMemo(() => (day ? buildSessionEntries(day, goals, tags) : []), [day, goals, tags])
  const filters = useMemo(() => buildAvailableFilters(tags.filter(tag => goals.some(goal => goal.primaryTagId === tag.id))), [tags, goals])
  const selectedFilter = filters.find(filter => filterId(filter) === selectedFilterId) ?? filters[0]

  const scoreFor = useMemo(() => createScoreFn({
    now: timer.now,
    weekDays,
    focusMode: settings.plannerPreferences.focusMode,
    selectedThemeIds: settings.selectedThemeIds
  }), [timer.now, weekDays, settings])

  const glance = glanceList(entries, scoreFor, plan)
  const hiddenToday = glanceOverflow(entries, glance)
  const visible = selectedFilter.kind === 'activeToday' && !showAllToday
    ? glance
    : filterSessions(entries, selectedFilter)
  const recommendedIds = new Set(getRecommendedSessions(entries, scoreFor, plan).map(entry => entry.session.id))

  const activeEntry = entries.find(entry => entry.session.id === timer.activeSessionId) ?? null

  const handleSearchOpen = useCallback(() => setSearchOpen(true), [setSearchOpen])
  const handleToggleCurrent = useCallback(() => {
    const target = timer.activeSessionId ?? visible[0]?.session.id
    if (target) void toggleTimer(target)
  }, [timer.activeSessionId, visible, toggleTimer])

  useGlobalKeyboard({
    onSearchOpen: handleSearchOpen,
    onToggleTimer: activeTab === 'today' ? handleToggleCurrent : undefined
  })

  if (isLoading && !day) {
    return (
      <div className="min-h-screen bg-background flex items-center justify-center">
        <div className="text-center">
          <div className="animate-spin rounded-full h-12 w-12 border-b-2 border-primary mx-auto mb-4"></div>
          <p className="text-muted-foreground">Loading today...</p>
        </div>
      </div>
    )
  }

  return (
    <div className="min-h-screen bg-background flex flex-col h-screen">
      <header className="border-b px-6 py-4 flex items-center justify-between">
        <div>
          <h1 className="text-2xl font-bold">Tempo</h1>
          <p className="text-sm text-muted-foreground">{format(new Date(), 'EEEE, MMMM d')}</p>
        </div>
        <nav className="flex items-center gap-2">
          {TABS.map(({ id, label, icon: Icon }) => (
            <Button
              key={id}
              variant={activeTab === id ? 'default' : 'ghost'}
              size="sm"
              onClick={() => setActiveTab(id)}
            >
              <Icon className="h-4 w-4 mr-2" />
              {label}
            </Button>
          ))}
          <Button variant="outline" size="sm" onClick={handleSearchOpen}>
            <Search className="h-4 w-4 mr-2" />
            Search (⌘K)
          </Button>
        </nav>
      </header>

      {error && (
        <div className="bg-red-50 border-b border-red-200 px-6 py-2 flex items-center justify-between text-sm text-red-700">
          <span>{error}</span>
          <Button variant="ghost" size="icon" onClick={clearError} aria-label="Dismiss error">
            <X className="h-4 w-4" />
          </Button>
        </div>
      )}

      <main className="flex-1 overflow-auto">
        {activeTab === 'today' && (
          <div className="flex flex-col h-full">
            <div className="px-6 py-4 flex items-center justify-between border-b">
              <WeeklySparkline goals={goals} refreshKey={day?.updatedAt.toISOString()} />
              <Button variant="outline" size="sm" onClick={() => void planDay()} disabled={goals.length === 0}>
                <Sparkles className="h-4 w-4 mr-2" />
                Plan my day
              </Button>
            </div>

            {plan && (
              <div className="px-6 py-3 border-b text-sm text-muted-foreground flex items-start gap-2">
                <CalendarCheck className="h-4 w-4 mt-0.5 shrink-0" />
                <span>{plan.overallStrategy}</span>
              </div>
            )}

            <FilterBar
              filters={filters}
              entries={entries}
              selectedFilterId={filterId(selectedFilter)}
              onSelect={id => {
                setShowAllToday(false)
                setSelectedFilterId(id)
              }}
            />

            <div className="flex-1 overflow-auto">
              {visible.map(entry => (
                <SessionRow
                  key={entry.session.id}
                  entry={entry}
                  isActive={timer.activeSessionId === entry.session.id}
                  isPaused={timer.isPaused}
                  timerText={timer.timerText}
                  isRecommended={recommendedIds.has(entry.session.id)}
                  onToggle={id => void toggleTimer(id)}
                  onPause={() => void pauseTimer()}
                  onSkip={id => void skipSession(id)}
                  onMarkDone={id => void markDone(id)}
                  onLogManual={(id, start, duration) => void logManual(id, start, duration)}
                />
              ))}
              {selectedFilter.kind === 'activeToday' && !showAllToday && hiddenToday > 0 && (
                <div className="px-6 py-3">
                  <Button variant="ghost" size="sm" onClick={() => setShowAllToday(true)}>
                    Show {hiddenToday} more
                  </Button>
                </div>
              )}
              {visible.length === 0 && (
                <p className="px-6 py-8 text-center text-muted-foreground">Nothing here yet.</p>
              )}
              <div className="px-6 py-4">
                <NewGoalForm showSuggestions={goals.length === 0} />
              </div>
            </div>

            <NowPlayingBar
              goal={activeEntry?.goal ?? null}
              sessionId={timer.activeSessionId}
              isPaused={timer.isPaused}
              timerText={timer.timerText}
              onPause={() => void pauseTimer()}
              onResume={() => resumeTimer()}
              onStop={() => void stopTimer()}
            />
          </div>
        )}

        {activeTab === 'analytics' && <Analytics />}
        {activeTab === 'settings' && <Settings />}
      </main>

      <GlobalSearch
        isOpen={isSearchOpen}
        onClose={() => setSearchOpen(false)}
        entries={entries}
        filters={filters}
        onSelectSession={(_sessionId, selectedId) => {
          setActiveTab('today')
          setSelectedFilterId(selectedId)
        }}
      />
    </div>
  )
}

export default App
