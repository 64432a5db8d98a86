export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const MAX_TIMEOUT = 2147483647; // largest delay a Node timer accepts
export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 32;

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const DEFAULT_ACCEPT_LANGUAGE = 'de-DE,de;q=0.9,en;q=0.8';

export const LIST_SEPARATOR = ' | ';
