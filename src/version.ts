export const VERSION = '0.5.0';
export const REPOSITORY_URL = 'https://example.com/resource-watchdog';
