const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const DAY_MS = 24 * 60 * 60 * 1000;

export interface TimeOfDay {
  hour: number;
  minute: number;
}

function startOfDayUtc(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Resolves spoken day references ("today", "tomorrow", "Monday", "next friday",
 * "2026-03-02") to a UTC calendar date. Named weekdays always mean the next occurrence
 * after today; anything unrecognised means tomorrow.
 */
export function resolveDay(day: string, now: Date): Date {
  const today = startOfDayUtc(now);
  const lower = day.trim().toLowerCase();

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(lower);
  if (iso) {
    return new Date(Date.UTC(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3])));
  }
  if (lower === 'today') return today;
  if (lower === 'tomorrow') return new Date(today.getTime() + DAY_MS);

  const weekday = WEEKDAYS.findIndex((name) => lower.includes(name));
  if (weekday !== -1) {
    let ahead = weekday - today.getUTCDay();
    if (ahead <= 0) ahead += 7;
    return new Date(today.getTime() + ahead * DAY_MS);
  }

  return new Date(today.getTime() + DAY_MS);
}

/** "2pm", "10:30am", "14:00", "morning"... Defaults to 10:00. */
export function parseTimeOfDay(time: string): TimeOfDay {
  const lower = time.toLowerCase().replace(/\s+/g, '');
  if (lower.includes('morning')) return { hour: 10, minute: 0 };
  if (lower.includes('afternoon')) return { hour: 14, minute: 0 };
  if (lower.includes('evening')) return { hour: 17, minute: 0 };

  const match = /(\d{1,2})(?::?(\d{2}))?/.exec(lower);
  if (!match) return { hour: 10, minute: 0 };

  let hour = Number(match[1]);
  const minute = match[2] ? Number(match[2]) : 0;
  if (lower.includes('pm') && hour < 12) hour += 12;
  if (lower.includes('am') && hour === 12) hour = 0;
  return { hour: Math.min(hour, 23), minute: Math.min(minute, 59) };
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function formatTime({ hour, minute }: TimeOfDay): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}
