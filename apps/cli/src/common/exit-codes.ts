export const EXIT_OK = 0;
export const EXIT_HOST_FAILURES = 1;
export const EXIT_PREFLIGHT = 2;
export const EXIT_INTERRUPTED = 130;
export const EXIT_INTERNAL = 3;
