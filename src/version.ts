/** Package version, recorded in run metadata and the User-Agent header */
export const VERSION = '0.1.0';
