function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
}

export function log(message: string): void {
  console.log(`[${timestamp()}] ${message}`);
}

export function warn(message: string): void {
  console.warn(`[${timestamp()}] WARN ${message}`);
}

/** Only printed when LOG_LEVEL=debug. */
export function debug(message: string): void {
  if (process.env.LOG_LEVEL !== 'debug') return;
  console.log(`[${timestamp()}] DEBUG ${message}`);
}
