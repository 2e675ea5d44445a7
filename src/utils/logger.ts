export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export const log = (level: LogLevel, msg: string, meta?: unknown): void => {
  const stamp = new Date().toISOString();
  const line = `[${stamp}] [${level}] ${msg}`;
  const write = level === 'ERROR' ? console.error : console.log;
  if (meta !== undefined) {
    write(line, meta);
  } else {
    write(line);
  }
};
