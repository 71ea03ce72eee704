//NOTE(self): One ISO-8601 parser for every timestamp the tracker hands back
//NOTE(self): GitHub returns `2024-05-01T12:00:00Z`; offsets and fractional seconds are accepted too

const ISO_8601 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

export function parseIsoTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  if (!ISO_8601.test(trimmed)) return null;

  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export function hoursBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / (60 * 60 * 1000);
}

export function formatDuration(hours: number): string {
  if (hours < 1) {
    return `${Math.max(0, Math.round(hours * 60))}m`;
  }
  if (hours < 48) {
    const totalMinutes = Math.round(hours * 60);
    const whole = Math.floor(totalMinutes / 60);
    const minutes = totalMinutes % 60;
    return minutes > 0 ? `${whole}h ${minutes}m` : `${whole}h`;
  }
  return `${(hours / 24).toFixed(1)}d`;
}
