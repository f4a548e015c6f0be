function shouldLog(): boolean {
  return process.env.PARSER_DEBUG === '1';
}

export function logDebug(scope: string, message: string): void {
  if (!shouldLog()) return;
  console.log(`[${scope}] ${message}`);
}

export function logWarn(scope: string, message: string): void {
  console.warn(`[${scope}] ${message}`);
}
