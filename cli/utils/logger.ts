// All log output goes to stderr; stdout only ever carries links.
export class Logger {
  private static verbose = process.env.HAMLINK_DEBUG === "1";

  static setVerbose(enabled: boolean) {
    this.verbose = enabled;
  }

  static debug(message: string, ...args: unknown[]) {
    if (this.verbose) {
      console.error(`[DEBUG] ${message}`, ...args);
    }
  }

  static info(message: string, ...args: unknown[]) {
    console.error(`[INFO] ${message}`, ...args);
  }

  static warn(message: string, ...args: unknown[]) {
    console.error(`[WARN] ${message}`, ...args);
  }

  static error(message: string, ...args: unknown[]) {
    console.error(`[ERROR] ${message}`, ...args);
  }
}
