import { useState, type FormEvent } from 'react';
import { Plus } from 'lucide-react';
import { createGoal } from '@/lib/goalManager';
import { loadSuggestionCategories, type GoalSuggestionTemplate } from '@/lib/suggestions';
import { ValidationError } from '@/lib/errors';
import { Button } from './ui/button';
import { Input } from './ui/input';

interface NewGoalFormProps {
  showSuggestions?: boolean;
  onCreated?: () => void;
}

export function NewGoalForm({ showSuggestions = false, onCreated }: NewGoalFormProps) {
  const [title, setTitle] = useState('');
  const [hoursPerWeek, setHoursPerWeek] = useState('3');
  const [error, setError] = useState<string | null>(null);
  const [isSaving, setIsSaving] = useState(false);

  const applySuggestion = (suggestion: GoalSuggestionTemplate) => {
    setTitle(suggestion.title);
    setHoursPerWeek(String(Math.round((suggestion.duration / 60) * 10) / 10));
  };

  const handleSubmit = async (event: FormEvent) => {
    event.preventDefault();
    setError(null);
    setIsSaving(true);
    try {
      await createGoal({ title, weeklyTarget: Math.round(Number.parseFloat(hoursPerWeek) * 3600) });
      setTitle('');
      onCreated?.();
    } catch (err) {
      if (err instanceof ValidationError) {
        setError(err.message);
      } else {
        console.error('Failed to create goal:', err);
        setError('Could not save the goal');
      }
    } finally {
      setIsSaving(false);
    }
  };

  return (
    <div className="space-y-3">
      <form onSubmit={e => void handleSubmit(e)} className="flex items-center gap-2">
        <Input
          value={title}
          onChange={e => setTitle(e.target.value)}
          placeholder="New goal"
          aria-label="Goal title"
        />
        <Input
          type="number"
          min={0.5}
          step={0.5}
          value={hoursPerWeek}
          onChange={e => setHoursPerWeek(e.target.value)}
          className="w-24"
          aria-label="Hours per week"
        />
        <span className="text-sm text-muted-foreground whitespace-nowrap">h / week</span>
        <Button type="submit" size="icon" disabled={isSaving} aria-label="Add goal">
          <Plus className="h-4 w-4" />
        </Button>
      </form>
      {error && <p className="text-sm text-red-600">{error}</p>}

      {showSuggestions && (
        <div className="space-y-2">
          {loadSuggestionCategories().map(category => (
            <div key={category.id}>
              <div className="text-xs font-medium text-muted-foreground uppercase tracking-wide mb-1">{category.name}</div>
              <div className="flex flex-wrap gap-2">
                {category.suggestions.map(suggestion => (
                  <button
                    key={suggestion.id}
                    type="button"
                    onClick={() => applySuggestion(suggestion)}
                    className="rounded-full border px-3 py-1 text-sm hover:bg-accent"
                    title={suggestion.subtitle}
                  >
                    {suggestion.title}
                  </button>
                ))}
              </div>
            </div>
          ))}
        </div>
      )}
    </div>
  );
}
