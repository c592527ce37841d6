import { format } from 'date-fns';

/**
 * Format a date for display, in local time
 */
export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}
