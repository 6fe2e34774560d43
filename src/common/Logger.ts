export type Logger = (message: string) => void;

export namespace Logger {
  export const console: Logger = message => globalThis.console.log(`[imagesmith] ${message}`);

  export const silent: Logger = () => undefined;
}
