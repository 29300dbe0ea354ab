import { readText, isMissingFileError } from "./fileStorage";

export class LogsUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LogsUnavailableError";
  }
}

// Returns the last `count` non-empty lines of the service log file, oldest first.
export async function tailLogFile(filePath: string | undefined, count: number): Promise<string[]> {
  if (!filePath) {
    throw new LogsUnavailableError("LOG_FILE is not configured; logs are only written to stdout.");
  }

  let text: string;
  try {
    text = await readText(filePath);
  } catch (err) {
    if (isMissingFileError(err)) {
      throw new LogsUnavailableError(`Log file does not exist yet: ${filePath}`);
    }
    throw err;
  }

  const lines = text.split("\n").filter((line) => line.length > 0);
  return lines.slice(-count);
}
