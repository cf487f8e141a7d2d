function splitSeconds(totalSeconds: number): { hours: number; minutes: number; seconds: number } {
  const safe = Math.max(Math.floor(totalSeconds), 0);
  return {
    hours: Math.floor(safe / 3600),
    minutes: Math.floor((safe % 3600) / 60),
    seconds: safe % 60
  };
}

const pad = (value: number) => value.toString().padStart(2, '0');

// "1h 30m", or "45m" under an hour
export function formatHourMinute(totalSeconds: number): string {
  const { hours, minutes } = splitSeconds(totalSeconds);
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

// "1:05:09", "5:09" or "0:09"
export function formatClock(totalSeconds: number): string {
  const { hours, minutes, seconds } = splitSeconds(totalSeconds);
  if (hours > 0) {
    return `${hours}:${pad(minutes)}:${pad(seconds)}`;
  }
  return `${minutes}:${pad(seconds)}`;
}

export function formatComponents(totalSeconds: number): string {
  const { hours, minutes, seconds } = splitSeconds(totalSeconds);
  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0) parts.push(`${seconds}s`);
  return parts.length > 0 ? parts.join(' ') : '0s';
}

export function formatFullUnits(totalSeconds: number): string {
  const { hours, minutes, seconds } = splitSeconds(totalSeconds);
  const unit = (value: number, name: string) => `${value} ${name}${value === 1 ? '' : 's'}`;
  const parts: string[] = [];
  if (hours > 0) parts.push(unit(hours, 'hour'));
  if (minutes > 0) parts.push(unit(minutes, 'minute'));
  if (seconds > 0 || parts.length === 0) parts.push(unit(seconds, 'second'));
  return parts.join(', ');
}

export function formatTimerText(elapsedSeconds: number, targetSeconds: number): string {
  if (targetSeconds <= 0) {
    return formatClock(elapsedSeconds);
  }
  return `${formatClock(elapsedSeconds)}/${formatClock(targetSeconds)}`;
}
