const DEFAULT_EXPORT_BASENAME = 'diary';
const AUDIO_EXTENSION = '.mp3';

export function defaultOutputBaseName(now: number = Date.now()): string {
  return `${DEFAULT_EXPORT_BASENAME}_${Math.floor(now / 1000)}`;
}

/**
 * Build the download name from a user-provided base name. Path separators and
 * reserved characters are replaced, and a trailing `.mp3` is not doubled.
 */
export function buildOutputFilename(baseName: string | null | undefined, now: number = Date.now()): string {
  const cleaned = (baseName ?? '')
    .trim()
    .replace(/[\\/:*?"<>|]+/g, '_')
    .replace(/\.mp3$/i, '')
    .trim();
  const safeBase = cleaned && !/^\.+$/.test(cleaned) ? cleaned : defaultOutputBaseName(now);
  return `${safeBase}${AUDIO_EXTENSION}`;
}

export function downloadBlob(blob: Blob, filename: string): void {
  if (typeof document === 'undefined') {
    return;
  }
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = filename;
  anchor.rel = 'noopener';
  document.body.appendChild(anchor);
  anchor.click();
  anchor.remove();
  // Revoke after the click has been dispatched.
  setTimeout(() => URL.revokeObjectURL(url), 0);
}
