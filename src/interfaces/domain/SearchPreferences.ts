export const DATE_POSTED_OPTIONS = ['Last 24 hours', 'Last 7 days', 'Last 30 days', 'Last 90 days'] as const;
export const REMOTE_OPTIONS = ['Any', 'Remote only', 'Hybrid', 'In-office'] as const;

export type DatePosted = typeof DATE_POSTED_OPTIONS[number];
export type RemotePreference = typeof REMOTE_OPTIONS[number];

export interface SearchPreferences {
  title?: string;
  location?: string;
  company?: string;
  datePosted: DatePosted;
  remote: RemotePreference;
}
