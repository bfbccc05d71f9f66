/**
 * `qualtrics` command line.
 *
 * Each command maps onto one public operation (`export` drives the
 * create → poll → download sequence). Results are printed as JSON, survey
 * documents as XML. Exit codes: 0 success, 1 gateway error, 2 usage or
 * configuration error.
 */

import { parseArgs } from 'node:util';
import { isApiError } from './api/errors.js';
import type { Outcome } from './api/outcome.js';
import { exportFormats } from './api/schemas/index.js';
import type { QualtricsApi } from './api/types.js';
import { ConfigError } from './config.js';
import { isTerminal, pollExport, requested } from './workflows/exports.js';

export interface CliIo {
  /** Builds the client; only called once a command needs it. */
  connect: () => QualtricsApi;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
  writeFile: (path: string, bytes: Uint8Array) => Promise<void>;
  sleep: (ms: number) => Promise<void>;
}

export const USAGE = `Usage: qualtrics <command> [options]

Surveys
  surveys                                  List surveys
  survey <surveyId>                        Print the survey definition (XML)
  activate <surveyId>                      Activate a survey
  deactivate <surveyId>                    Deactivate a survey
  delete-survey <surveyId>                 Delete a survey

Panels
  panels --library <id>                    List panels in a library
  panel --library <id> --panel <id>        List panel members [--embedded a,b] [--limit n]
  panel-count --library <id> --panel <id>  Count panel members
  create-panel --library <id> --name <n>   Create a panel [--category c]
  delete-panel --library <id> --panel <id> Delete a panel
  import-panel --library <id> --name <n> --file <csv>
                                           Import contacts [--panel <id>] [--no-headers]
  recipient --library <id> --recipient <id>

Responses
  response --survey <id> --response <id>   Print one response
  distributions [--survey <id>] [--distribution <id>] [--library <id>]
  export --survey <id> [--format csv] [--output <file>] [--interval ms] [--max-polls n]
`;

const OPTIONS = {
  library: { type: 'string' },
  panel: { type: 'string' },
  survey: { type: 'string' },
  response: { type: 'string' },
  recipient: { type: 'string' },
  distribution: { type: 'string' },
  name: { type: 'string' },
  category: { type: 'string' },
  file: { type: 'string' },
  embedded: { type: 'string' },
  limit: { type: 'string' },
  format: { type: 'string' },
  output: { type: 'string', short: 'o' },
  interval: { type: 'string' },
  'max-polls': { type: 'string' },
  'no-headers': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

const DEFAULT_INTERVAL_MS = 2000;
const DEFAULT_MAX_POLLS = 60;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isParseArgsError(err: unknown): boolean {
  return (
    err instanceof TypeError && 'code' in err && typeof err.code === 'string' && err.code.startsWith('ERR_PARSE_ARGS')
  );
}

function required(value: string | undefined, flag: string): string {
  if (!value) throw new UsageError(`Missing --${flag}`);
  return value;
}

function positiveInteger(value: string | undefined, flag: string, fallback?: number): number | undefined {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    (command ? io.stdout : io.stderr)(USAGE);
    return command ? 0 : 2;
  }

  try {
    const { values, positionals } = parseArgs({ args: [...rest], options: OPTIONS, allowPositionals: true });
    if (values.help) {
      io.stdout(USAGE);
      return 0;
    }

    const surveyId = () => required(positionals[0] ?? values.survey, 'survey');
    const printOutcome = <T>(outcome: Outcome<T>, render: (data: T) => string = toJson) => {
      if (outcome.kind === 'empty') {
        io.stderr(`No data (${outcome.reason})`);
      } else {
        io.stdout(render(outcome.data));
      }
    };

    switch (command) {
      case 'surveys':
        io.stdout(toJson(await io.connect().getSurveys()));
        return 0;

      case 'survey': {
        const id = surveyId();
        printOutcome(await io.connect().getSurvey(id), (survey) => survey.document);
        return 0;
      }

      case 'activate':
      case 'deactivate':
      case 'delete-survey': {
        const id = surveyId();
        const api = io.connect();
        if (command === 'activate') await api.activateSurvey(id);
        else if (command === 'deactivate') await api.deactivateSurvey(id);
        else await api.deleteSurvey(id);
        io.stdout(toJson({ surveyId: id, ok: true }));
        return 0;
      }

      case 'panels':
        io.stdout(toJson(await io.connect().getPanels(required(values.library, 'library'))));
        return 0;

      case 'panel': {
        const params = {
          libraryId: required(values.library, 'library'),
          panelId: required(values.panel, 'panel'),
          embeddedData: values.embedded ? values.embedded.split(',') : undefined,
          numberOfRecords: positiveInteger(values.limit, 'limit'),
        };
        printOutcome(await io.connect().getPanel(params));
        return 0;
      }

      case 'panel-count': {
        const params = { libraryId: required(values.library, 'library'), panelId: required(values.panel, 'panel') };
        io.stdout(toJson({ count: await io.connect().getPanelMemberCount(params) }));
        return 0;
      }

      case 'create-panel': {
        const params = {
          libraryId: required(values.library, 'library'),
          name: required(values.name, 'name'),
          category: values.category,
        };
        io.stdout(toJson({ panelId: await io.connect().createPanel(params) }));
        return 0;
      }

      case 'delete-panel': {
        const params = { libraryId: required(values.library, 'library'), panelId: required(values.panel, 'panel') };
        await io.connect().deletePanel(params);
        io.stdout(toJson({ panelId: params.panelId, ok: true }));
        return 0;
      }

      case 'import-panel': {
        const libraryId = required(values.library, 'library');
        const name = required(values.name, 'name');
        const csv = await io.readFile(required(values.file, 'file'));
        const panelId = await io.connect().importPanel({
          libraryId,
          name,
          csv,
          columnHeaders: !values['no-headers'],
          panelId: values.panel,
        });
        io.stdout(toJson({ panelId }));
        return 0;
      }

      case 'recipient': {
        const params = {
          libraryId: required(values.library, 'library'),
          recipientId: required(values.recipient, 'recipient'),
        };
        io.stdout(toJson(await io.connect().getRecipient(params)));
        return 0;
      }

      case 'response': {
        const params = { surveyId: required(values.survey, 'survey'), responseId: required(values.response, 'response') };
        io.stdout(toJson(await io.connect().getResponse(params)));
        return 0;
      }

      case 'distributions': {
        const params = { surveyId: values.survey, distributionId: values.distribution, libraryId: values.library };
        io.stdout(toJson(await io.connect().getDistributions(params)));
        return 0;
      }

      case 'export':
        return await exportResponses(values, io);

      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (err) {
    if (err instanceof UsageError || isParseArgsError(err)) {
      io.stderr(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
      return 2;
    }
    if (err instanceof ConfigError) {
      io.stderr(`${err.name}: ${err.message}`);
      return 2;
    }
    if (isApiError(err)) {
      io.stderr(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

interface ExportFlags {
  survey?: string;
  format?: string;
  output?: string;
  interval?: string;
  'max-polls'?: string;
}

async function exportResponses(values: ExportFlags, io: CliIo): Promise<number> {
  const surveyId = required(values.survey, 'survey');
  const rawFormat = values.format ?? 'csv';
  const format = exportFormats.find((candidate) => candidate === rawFormat);
  if (!format) {
    throw new UsageError(`--format must be one of ${exportFormats.join(', ')}, got "${rawFormat}"`);
  }
  const interval = positiveInteger(values.interval, 'interval', DEFAULT_INTERVAL_MS) ?? DEFAULT_INTERVAL_MS;
  const maxPolls = positiveInteger(values['max-polls'], 'max-polls', DEFAULT_MAX_POLLS) ?? DEFAULT_MAX_POLLS;

  const api = io.connect();
  const { id } = await api.createResponseExport({ surveyId, format });
  let state = requested(id);

  for (let poll = 0; poll < maxPolls && !isTerminal(state); poll++) {
    if (poll > 0) await io.sleep(interval);
    state = await pollExport(api, state);
  }

  if (state.phase === 'failed') {
    io.stderr(`Export ${id} failed: ${state.reason}`);
    return 1;
  }
  if (state.phase !== 'complete') {
    io.stderr(`Export ${id} not complete after ${maxPolls} polls`);
    return 1;
  }

  if (!values.output) {
    io.stdout(toJson({ id, fileUrl: state.fileUrl }));
    return 0;
  }
  const bytes = await api.getResponseExportFile(state.fileUrl);
  await io.writeFile(values.output, bytes);
  io.stdout(toJson({ id, fileUrl: state.fileUrl, file: values.output, bytes: bytes.length }));
  return 0;
}
