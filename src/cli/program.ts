import { Command } from 'commander';
import { Operation } from '../common/dto/command-request.dto';
import { ENDPOINT_KINDS } from '../common/types/endpoint-kind';

export type PlainRequest = Record<string, unknown>;
export type RequestHandler = (plain: PlainRequest) => Promise<void>;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Commander keeps `--kind` under `kind`; the request calls it `kinds`. */
export function toPlainRequest(operation: Operation, opts: Record<string, unknown>, extra: PlainRequest = {}): PlainRequest {
  const { kind, ...rest } = opts;
  const plain: PlainRequest = { ...rest, operation, ...extra };
  if (Array.isArray(kind) && kind.length > 0 && plain.kinds === undefined) {
    plain.kinds = kind;
  }
  return plain;
}

export function buildProgram(handle: RequestHandler): Command {
  const program = new Command();
  program
    .name('clusterscope')
    .description('Capture, store and compare diagnostics of a distributed database cluster')
    .option('-H, --hosts <hosts>', 'comma separated hostnames or addresses')
    .option('-P, --ports <ports>', 'comma separated HTTP ports of the server processes')
    .option('-p, --parallel <n>', 'maximum number of requests in flight per kind')
    .option('--stat-name-match <regex>', 'only show statistics whose name matches')
    .option('--table-name-match <regex>', 'only show tables whose name matches')
    .option('--hostname-match <regex>', 'only show (and query, for live passes) matching host:port')
    .option('-g, --gauges-enable', 'include gauges in diffs')
    .option('-d, --details-enable', 'show per table / tablet / label rows instead of totals')
    .option('-s, --silent', 'suppress per-host warnings')
    .option('--include-unchanged', 'include metrics whose value did not change')
    .option('--disable-threads', 'skip the thread dump when capturing')
    .option('--uuid <id>', 'table or tablet id for the table-detail and tablet-detail kinds')
    .option('--sql-length <n>', 'truncate statement text to this many characters')
    .option('--log-severity <letters>', 'log severities to print, from I, W, E and F')
    .option('--kind <kind>', 'limit to this kind, repeatable', collect, []);

  program
    .command('snapshot')
    .description('capture every kind into a new numbered snapshot')
    .option('-c, --comment <text>', 'comment stored in the snapshot catalog')
    .action(async (_opts: Record<string, unknown>, command: Command) => {
      await handle(toPlainRequest(Operation.SNAPSHOT, command.optsWithGlobals()));
    });

  program
    .command('list')
    .description('list the snapshot catalog')
    .action(async (_opts: Record<string, unknown>, command: Command) => {
      await handle(toPlainRequest(Operation.LIST, command.optsWithGlobals()));
    });

  program
    .command('print')
    .description('print one kind, live or from a stored snapshot')
    .argument('<kind>', `one of: ${ENDPOINT_KINDS.join(', ')}`)
    .argument('[snapshot]', 'snapshot number; a live pass is printed when omitted')
    .action(async (kind: string, snapshot: string | undefined, _opts: Record<string, unknown>, command: Command) => {
      const extra: PlainRequest = { kinds: [kind] };
      if (snapshot !== undefined) extra.snapshot = snapshot;
      await handle(toPlainRequest(Operation.PRINT, command.optsWithGlobals(), extra));
    });

  program
    .command('diff')
    .description('compare two stored snapshots')
    .requiredOption('-b, --begin <n>', 'begin snapshot number')
    .requiredOption('-e, --end <n>', 'end snapshot number')
    .action(async (_opts: Record<string, unknown>, command: Command) => {
      await handle(toPlainRequest(Operation.DIFF, command.optsWithGlobals()));
    });

  program
    .command('adhoc-diff')
    .description('capture twice without storing and compare the two passes')
    .action(async (_opts: Record<string, unknown>, command: Command) => {
      await handle(toPlainRequest(Operation.ADHOC_DIFF, command.optsWithGlobals()));
    });

  return program;
}
