import chalk from "chalk";

type Level = "info" | "warn" | "error";

const paint: Record<Level, (s: string) => string> = {
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export type Logger = Record<Level, (message: string) => void>;

export function createLogger(scope: string): Logger {
  const prefix = chalk.gray(`[${scope}]`);
  const write = (level: Level) => (message: string) => {
    const line = `${prefix} ${paint[level](message)}`;
    if (level === "info") console.info(line);
    else console.error(line);
  };

  return { info: write("info"), warn: write("warn"), error: write("error") };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
