// SUBTITLE TIMESTAMPS
// Seconds offset -> "HH:MM:SS,mmm" (SRT) / "HH:MM:SS.mmm" (WebVTT)

export type SubtitleFormat = 'srt' | 'vtt';

const MILLISECOND_SEPARATOR: Record<SubtitleFormat, string> = {
  srt: ',',
  vtt: '.',
};

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a non-negative offset for the given subtitle format.
 * Every field is truncated, never rounded: 1.9996 renders as 00:00:01,999.
 */
export function formatTimestamp(seconds: number, format: SubtitleFormat): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);
  const millis = Math.floor((seconds % 1) * 1000);

  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)}${MILLISECOND_SEPARATOR[format]}${pad(millis, 3)}`;
}

export function formatSrtTimestamp(seconds: number): string {
  return formatTimestamp(seconds, 'srt');
}

export function formatVttTimestamp(seconds: number): string {
  return formatTimestamp(seconds, 'vtt');
}
