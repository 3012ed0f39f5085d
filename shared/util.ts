export const sleep = (t: number) => new Promise<void>((resolve) => setTimeout(() => resolve(), t));

export const formatTime = (secs?: number, showHours: boolean = false) => {
  if (!secs) return `0:00`;
  const roundedSecs = Math.floor(secs % 60);
  let minutes = Math.floor(secs / 60);
  if (showHours && minutes >= 60) {
    const hours = Math.floor(minutes / 60);
    minutes = minutes % 60;
    return `${hours}:${String(minutes).padStart(2, '0')}:${String(roundedSecs).padStart(2, '0')}`;
  }
  return `${minutes}:${String(roundedSecs).padStart(2, '0')}`;
};

export const formatBytes = (bytes: number) => {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
};

export type LogLevel = 'info' | 'error' | 'warn';

export type Logger = (...args: unknown[]) => void;

export const createLogger = (name: string, logLevel: LogLevel = 'info'): Logger => {
  return (...args: unknown[]) => {
    if (process.env.LOG_SILENT === '1') return;
    console[logLevel](new Date().toLocaleString(), `[${name}]`, ...args);
  };
};

export const errorMessage = (err: unknown) => err instanceof Error ? err.message : String(err);
