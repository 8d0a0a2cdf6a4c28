import type { ApiRecord } from '@courtsync/resilient-fetch';

export function formatSummary(records: readonly ApiRecord[]): string[] {
  const lines = ['', 'Summary:', `- Records saved: ${records.length}`];
  const [first] = records;
  if (!first) {
    lines.push('- No records to summarize');
    return lines;
  }

  lines.push(`- Opinion ID: ${display(first.id)}`);
  lines.push(`- Case URL: ${display(first.absolute_url)}`);
  lines.push(`- Date filed: ${display(first.date_filed)}`);

  const text = first.plain_text;
  if (typeof text === 'string') {
    lines.push(`- Opinion length: ${text.length} characters`);
  } else {
    lines.push('- Opinion text not included (possibly filtered)');
  }
  return lines;
}

function display(value: unknown): string {
  if (value === undefined || value === null) {
    return 'N/A';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}
