import {
  countSessions,
  filterId,
  filterText,
  type SessionEntry,
  type SessionFilter
} from '@/lib/sessionFilterService';
import { themeColor } from '@/lib/themes';
import { cn } from '@/lib/utils';

interface FilterBarProps {
  filters: SessionFilter[];
  entries: SessionEntry[];
  selectedFilterId: string;
  onSelect: (filterId: string) => void;
}

export function FilterBar({ filters, entries, selectedFilterId, onSelect }: FilterBarProps) {
  return (
    <div className="flex gap-2 overflow-x-auto px-6 py-3 border-b" role="tablist">
      {filters.map(filter => {
        const id = filterId(filter);
        const isSelected = id === selectedFilterId;
        return (
          <button
            key={id}
            type="button"
            role="tab"
            aria-selected={isSelected}
            onClick={() => onSelect(id)}
            className={cn(
              'flex items-center gap-2 rounded-full border px-3 py-1 text-sm whitespace-nowrap transition-colors',
              isSelected ? 'bg-primary text-primary-foreground' : 'hover:bg-accent'
            )}
          >
            {filter.kind === 'theme' && (
              <span className="h-2 w-2 rounded-full" style={{ backgroundColor: themeColor(filter.tag.themeId) }} />
            )}
            <span>{filterText(filter)}</span>
            <span className="text-xs opacity-70">{countSessions(entries, filter)}</span>
          </button>
        );
      })}
    </div>
  );
}
