import { Command } from 'commander';
import {
  collectInstrumentUsage,
  configureLogging,
  createLogger,
  exportJSON,
  exportMIDI,
  getXMSummary,
  readXMFile,
  reconstructTimeline,
  songDuration,
  xmNoteToName,
  type NoteEvent,
} from '@trackline/engine';

const log = createLogger('cli');

/**
 * Where command output goes. The default writes to the console and sets
 * `process.exitCode`; tests pass their own.
 */
export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
  setExitCode: (code: number) => void;
}

export const consoleIO: CliIO = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

type GlobalOptions = {
  verbose?: boolean;
  debug?: boolean;
};

export const EXPORT_FORMATS = ['json', 'midi'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

/**
 * Parse "1,2,4" into channel numbers. Throws on anything that is not a positive integer.
 */
export function parseChannelList(list: string): number[] {
  return list.split(',').map(part => {
    const trimmed = part.trim();
    const n = Number(trimmed);
    if (!/^\d+$/.test(trimmed) || n < 1) {
      throw new Error(`Invalid channel '${trimmed}' (expected a list like "1,2")`);
    }
    return n;
  });
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatEventLine(ev: NoteEvent): string {
  return `ch ${pad2(ev.channel)}  ${xmNoteToName(ev.note)}  I${pad2(ev.instrument)}  V${pad2(ev.volume)}  ${ev.start.toFixed(3)} -> ${ev.end.toFixed(3)}`;
}

function describeError(err: unknown, debug: boolean): string {
  if (err instanceof Error) {
    return debug && err.stack ? err.stack : err.message;
  }
  return String(err);
}

export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const fail = (what: string, err: unknown) => {
    io.error(`Failed to ${what}: ${describeError(err, globals().debug === true)}`);
    io.setExitCode(2);
  };

  program
    .name('trackline')
    .description('Decode FastTracker 2 XM modules into timed note events')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces and engine logs)');

  program.hook('preAction', () => {
    const opts = globals();
    if (opts.debug) configureLogging({ level: 'debug' });
    else if (opts.verbose) configureLogging({ level: 'info' });
  });

  program
    .command('inspect')
    .description('Print module metadata, instruments and decode warnings')
    .argument('<file>', 'Path to the .xm file')
    .action((file: string) => {
      try {
        const module = readXMFile(file);
        io.log(getXMSummary(module));
        io.log(`Duration: ${songDuration(module).toFixed(3)}s`);
      } catch (err) {
        fail('inspect file', err);
      }
    });

  program
    .command('instruments')
    .description('List the instruments each channel sounds')
    .argument('<file>', 'Path to the .xm file')
    .action((file: string) => {
      try {
        const module = readXMFile(file);
        for (const { channel, instruments } of collectInstrumentUsage(module)) {
          const list = instruments.length > 0
            ? instruments.map(n => {
                const name = module.instruments[n - 1]?.name;
                return name ? `${pad2(n)} (${name})` : pad2(n);
              }).join(', ')
            : '(silent)';
          io.log(`Ch ${pad2(channel)}: ${list}`);
        }
      } catch (err) {
        fail('list instruments', err);
      }
    });

  program
    .command('events')
    .description('Print the reconstructed note events, one per line')
    .argument('<file>', 'Path to the .xm file')
    .option('--channels <channels>', 'Comma-separated list of channels, e.g. "1,2"')
    .option('--limit <n>', 'Print at most n events')
    .action((file: string, options: { channels?: string; limit?: string }) => {
      try {
        const module = readXMFile(file);
        const channels = options.channels ? new Set(parseChannelList(options.channels)) : undefined;
        const limit = options.limit !== undefined ? parseInt(options.limit, 10) : Infinity;
        if (Number.isNaN(limit) || limit < 0) {
          throw new Error(`Invalid limit '${options.limit}'`);
        }

        const events = reconstructTimeline(module)
          .filter(ev => !channels || channels.has(ev.channel))
          .sort((a, b) => a.start - b.start || a.channel - b.channel);
        for (const ev of events.slice(0, limit)) {
          io.log(formatEventLine(ev));
        }
        if (globals().verbose) {
          io.log(`${events.length} events`);
        }
      } catch (err) {
        fail('list events', err);
      }
    });

  program
    .command('export')
    .description('Export the note timeline (JSON, MIDI)')
    .argument('<format>', 'Target format: json | midi')
    .argument('<file>', 'Path to the .xm file')
    .argument('[output]', 'Output file path (optional)')
    .option('-o, --out <path>', 'Output file path (overrides default)')
    .option('--channels <channels>', 'Comma-separated list of channels to export, e.g. "1,2"')
    .action((format: string, file: string, output: string | undefined, options: { out?: string; channels?: string }) => {
      if (!isExportFormat(format)) {
        io.error(`Unknown export format: ${format}`);
        io.setExitCode(2);
        return;
      }
      try {
        const { verbose, debug } = globals();
        const module = readXMFile(file);
        const channels = options.channels ? parseChannelList(options.channels) : undefined;

        let outPath = output || options.out;
        // If no output path provided, derive one from the input filename
        if (!outPath) {
          outPath = file.replace(/\.[^/.]+$/, '') + (format === 'json' ? '.json' : '.mid');
        }

        const opts = { channels, verbose: verbose === true, debug: debug === true };
        const written = format === 'json' ? exportJSON(module, outPath, opts) : exportMIDI(module, outPath, opts);
        log.info(`wrote ${written}`);
        io.log(`[OK] Exported ${format.toUpperCase()} file: ${written}`);
      } catch (err) {
        fail(`export ${format}`, err);
      }
    });

  return program;
}
