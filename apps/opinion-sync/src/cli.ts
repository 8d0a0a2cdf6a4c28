import { parseArgs } from 'node:util';
import { z } from 'zod';
import { CliUsageError } from './errors';

export const USAGE = `Usage: opinion-sync --user <name> [options]

Fetch CourtListener opinions and append them to <data-dir>/<user>_opinions.jsonl.

Options:
  --user <name>         Username to store data under (required)
  --limit <n>           How many records to fetch (default: 10)
  --date_min <date>     Filter: date_filed_min (YYYY-MM-DD); alias --date-min
  --token <token>       CourtListener API token (default: $COURTLISTENER_TOKEN)
  --ua <agent>          User-Agent string (default: $COURTLISTENER_UA)
  --fields <a,b,c>      Comma-separated fields to save
  --since-file <path>   Path to since-file for incremental sync
  --data-dir <path>     Output directory (default: data)
  -h, --help            Show this message`;

export const DEFAULT_LIMIT = 10;
export const DEFAULT_DATA_DIR = 'data';

export interface CliOptions {
  user: string;
  limit: number;
  dateMin?: string;
  token?: string;
  userAgent?: string;
  fields?: string[];
  sinceFile?: string;
  dataDir: string;
}

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const cliSchema = z.object({
  user: z
    .string({ required_error: '--user is required' })
    .trim()
    .min(1, '--user is required')
    .refine((value) => !/[\\/]/.test(value), '--user must not contain path separators'),
  limit: z.preprocess(
    (value) => value ?? String(DEFAULT_LIMIT),
    z.coerce
      .number({ invalid_type_error: '--limit must be a positive integer' })
      .int('--limit must be a positive integer')
      .positive('--limit must be a positive integer'),
  ),
  dateMin: optionalText.refine(
    (value) => value === undefined || /^\d{4}-\d{2}-\d{2}$/.test(value),
    '--date_min must look like YYYY-MM-DD',
  ),
  token: optionalText,
  userAgent: optionalText,
  fields: z
    .string()
    .optional()
    .transform((value) => {
      const list = (value ?? '')
        .split(',')
        .map((field) => field.trim())
        .filter((field) => field.length > 0);
      return list.length > 0 ? list : undefined;
    }),
  sinceFile: optionalText,
  dataDir: optionalText.transform((value) => value ?? DEFAULT_DATA_DIR),
});

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws CliUsageError for unknown flags, missing values or invalid input
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  let values: ReturnType<typeof parseRaw>['values'];
  try {
    ({ values } = parseRaw(argv));
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }

  if (values.help) {
    return { kind: 'help' };
  }

  const result = cliSchema.safeParse({
    user: values.user,
    limit: values.limit,
    dateMin: values.date_min ?? values['date-min'],
    token: values.token,
    userAgent: values.ua,
    fields: values.fields,
    sinceFile: values['since-file'],
    dataDir: values['data-dir'],
  });
  if (!result.success) {
    throw new CliUsageError(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return { kind: 'run', options: result.data };
}

function parseRaw(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      user: { type: 'string' },
      limit: { type: 'string' },
      date_min: { type: 'string' },
      'date-min': { type: 'string' },
      token: { type: 'string' },
      ua: { type: 'string' },
      fields: { type: 'string' },
      'since-file': { type: 'string' },
      'data-dir': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
