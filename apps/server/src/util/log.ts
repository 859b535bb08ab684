/**
 * Console logging with the service prefix
 */

const PREFIX = "[shortlink]";

export const log = {
  info: (message: string, ...rest: unknown[]): void => {
    console.log(`${PREFIX} ${message}`, ...rest);
  },
  error: (message: string, ...rest: unknown[]): void => {
    console.error(`${PREFIX} ${message}`, ...rest);
  },
};
