import { useState, useEffect, useRef, useMemo, useCallback } from 'react';
import { Search, X, ArrowDown, ArrowUp } from 'lucide-react';
import { Input } from './ui/input';
import { Button } from './ui/button';
import { searchSessions, type Highlight, type SearchResult } from '@/lib/searchService';
import { filterId, filterText, type SessionEntry, type SessionFilter } from '@/lib/sessionFilterService';
import { formatTimerText } from '@/lib/time-format';
import { cn } from '@/lib/utils';

interface GlobalSearchProps {
  isOpen: boolean;
  onClose: () => void;
  entries: SessionEntry[];
  filters: SessionFilter[];
  onSelectSession: (sessionId: string, filterId: string) => void;
}

interface FlatResult {
  result: SearchResult;
  filter: SessionFilter;
}

function highlightText(text: string, highlights: Highlight[]) {
  if (highlights.length === 0) {
    return <span>{text}</span>;
  }

  const parts = [];
  let lastIndex = 0;

  for (const { start, end } of highlights) {
    if (start < lastIndex) continue;
    if (start > lastIndex) {
      parts.push(<span key={`text-${lastIndex}`}>{text.slice(lastIndex, start)}</span>);
    }
    parts.push(
      <span key={`highlight-${start}`} className="bg-yellow-200 dark:bg-yellow-700 font-semibold">
        {text.slice(start, end)}
      </span>
    );
    lastIndex = end;
  }

  if (lastIndex < text.length) {
    parts.push(<span key={`text-${lastIndex}`}>{text.slice(lastIndex)}</span>);
  }

  return <>{parts}</>;
}

export function GlobalSearch({ isOpen, onClose, entries, filters, onSelectSession }: GlobalSearchProps) {
  const [query, setQuery] = useState('');
  const [selectedIndex, setSelectedIndex] = useState(0);
  const inputRef = useRef<HTMLInputElement>(null);

  const groups = useMemo(() => searchSessions(query, entries, filters), [query, entries, filters]);
  const flatResults = useMemo<FlatResult[]>(
    () => groups.flatMap(group => group.results.map(result => ({ result, filter: group.filter }))),
    [groups]
  );

  useEffect(() => {
    if (isOpen) {
      setQuery('');
      setSelectedIndex(0);
      inputRef.current?.focus();
    }
  }, [isOpen]);

  const handleSelect = useCallback((item: FlatResult) => {
    onSelectSession(item.result.entry.session.id, filterId(item.filter));
    onClose();
  }, [onSelectSession, onClose]);

  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      if (!isOpen) return;

      switch (e.key) {
        case 'Escape':
          e.preventDefault();
          onClose();
          break;
        case 'ArrowDown':
          e.preventDefault();
          setSelectedIndex(prev => Math.min(prev + 1, flatResults.length - 1));
          break;
        case 'ArrowUp':
          e.preventDefault();
          setSelectedIndex(prev => Math.max(prev - 1, 0));
          break;
        case 'Enter': {
          e.preventDefault();
          const selected = flatResults[selectedIndex];
          if (selected) handleSelect(selected);
          break;
        }
      }
    };

    document.addEventListener('keydown', handleKeyDown);
    return () => document.removeEventListener('keydown', handleKeyDown);
  }, [isOpen, flatResults, selectedIndex, onClose, handleSelect]);

  if (!isOpen) return null;

  let index = -1;

  return (
    <div className="fixed inset-0 bg-black/50 z-50 flex items-start justify-center pt-[20vh]">
      <div className="bg-background border rounded-lg shadow-2xl w-full max-w-2xl mx-4 max-h-[60vh] flex flex-col">
        <div className="flex items-center p-4 border-b">
          <Search className="h-5 w-5 text-muted-foreground mr-3" />
          <Input
            ref={inputRef}
            value={query}
            onChange={e => {
              setQuery(e.target.value);
              setSelectedIndex(0);
            }}
            placeholder="Search sessions..."
            className="border-0 text-lg"
            aria-label="Search sessions"
          />
          <Button variant="ghost" size="sm" onClick={onClose} className="ml-2" aria-label="Close search">
            <X className="h-4 w-4" />
          </Button>
        </div>

        <div className="flex-1 overflow-auto">
          {flatResults.length === 0 && (
            <div className="p-8 text-center text-muted-foreground">
              <Search className="h-12 w-12 mx-auto mb-4 opacity-50" />
              <h3 className="text-lg font-medium mb-2">No sessions found</h3>
              <p className="text-sm">Try a shorter or different title.</p>
            </div>
          )}

          {groups.map(group => (
            <div key={filterId(group.filter)}>
              <div className="px-4 py-2 text-xs font-medium text-muted-foreground uppercase tracking-wide border-b bg-muted/50">
                {filterText(group.filter)} ({group.results.length})
              </div>
              {group.results.map(result => {
                index++;
                const itemIndex = index;
                const { entry } = result;
                return (
                  <div
                    key={`${filterId(group.filter)}-${entry.session.id}`}
                    className={cn(
                      'px-4 py-3 cursor-pointer border-b hover:bg-muted/50 transition-colors flex justify-between',
                      selectedIndex === itemIndex && 'bg-accent'
                    )}
                    onClick={() => handleSelect({ result, filter: group.filter })}
                  >
                    <span className="text-sm font-medium truncate">
                      {highlightText(entry.goal.title, result.highlights)}
                    </span>
                    <span className="text-xs text-muted-foreground tabular-nums">
                      {formatTimerText(entry.progress.elapsedTime, entry.progress.dailyTarget)}
                    </span>
                  </div>
                );
              })}
            </div>
          ))}
        </div>

        <div className="px-4 py-2 border-t bg-muted/50 text-xs text-muted-foreground flex items-center justify-between">
          <div className="flex items-center space-x-4">
            <span className="flex items-center">
              <ArrowUp className="h-3 w-3 mr-1" />
              <ArrowDown className="h-3 w-3 mr-1" />
              Navigate
            </span>
            <span>↵ Select</span>
            <span>Esc Close</span>
          </div>
          {flatResults.length > 0 && (
            <span>{selectedIndex + 1} of {flatResults.length}</span>
          )}
        </div>
      </div>
    </div>
  );
}
