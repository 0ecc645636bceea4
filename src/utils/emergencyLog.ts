/**
 * Emergency logging for failures that happen while the Winston logger itself
 * is being built or is unavailable. Writes straight to stderr.
 */

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error !== undefined && error !== null) {
    return 'Non-string error occurred';
  }
  return '';
}

function writeEmergency(
  level: 'WARN' | 'ERROR',
  message: string,
  error?: unknown
): void {
  const timestamp = new Date().toISOString();
  const errorStr = describeError(error);

  const fullMessage = errorStr
    ? `${timestamp} [${level}] ${message}: ${errorStr}\n`
    : `${timestamp} [${level}] ${message}\n`;

  process.stderr.write(fullMessage);
}

export function emergencyWarn(message: string, error?: unknown): void {
  writeEmergency('WARN', message, error);
}

export function emergencyError(message: string, error?: unknown): void {
  writeEmergency('ERROR', message, error);
}
