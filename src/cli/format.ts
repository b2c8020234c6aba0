/**
 * Console formatting shared by the metrics CLI commands
 */

export function formatComplexity(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(2);
}

export function formatSigned(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

export function sectionsHeader(agency: string, date: string, count: number): string {
  return `📖 ${agency} @ ${date} (${count} chapter(s))`;
}

export function previewText(text: string, length: number): string {
  return text.length > length ? `${text.substring(0, length)}...` : text;
}
