import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { loadConfig as loadConfigFile } from "../config/config.js";
import type { ResolvedConfig } from "../config/types.js";
import { DEVICE_SORT_KEYS, detectIpConflicts, sortDevices, type DeviceSortKey } from "../devices/sort.js";
import { listNetworkInterfaces, type NetworkInterfaceChoice } from "../discovery/interfaces.js";
import { DiscoverySession } from "../discovery/session.js";
import { describeError } from "../infra/errors.js";
import { writeJsonFileAtomically } from "../infra/json-store.js";
import { createStderrLogger, type Logger } from "../infra/log.js";
import { DeviceRegistry } from "../registry/registry.js";
import { HOUR_MS } from "../registry/status.js";
import { FileRegistryStore } from "../registry/store.js";
import { DeviceTracker } from "../registry/tracker.js";
import { RECORD_SORT_KEYS, type RecordSortKey } from "../registry/types.js";
import {
  formatChangeSummary,
  formatDeviceTable,
  formatHistory,
  formatInterfaces,
  formatRecordTable,
  formatStats,
} from "./format.js";

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type EasyIpCliDeps = {
  io?: CliIo;
  loadConfig?: () => Promise<ResolvedConfig>;
  createSession?: (log: Logger) => DiscoverySession;
  openRegistry?: (opts: { missingThresholdMs: number; log: Logger }) => Promise<DeviceRegistry>;
  listInterfaces?: () => NetworkInterfaceChoice[];
  setExitCode?: (code: number) => void;
};

type DiscoveryCliOptions = {
  interface?: string;
  timeoutMs?: number;
  json?: boolean;
  verbose?: boolean;
};

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("expected a positive number");
  }
  return parsed;
}

function addDiscoveryOptions(command: Command): Command {
  return command
    .option("-i, --interface <address>", "Local IPv4 address to scan from (0.0.0.0 = all)")
    .option("--timeout-ms <ms>", "How long to collect responses", parsePositiveNumber)
    .option("--json", "Print machine-readable JSON")
    .option("-v, --verbose", "Log discovery progress to stderr");
}

/** Abort on Ctrl+C so an in-flight scan returns what it has. */
async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  try {
    return await fn(controller.signal);
  } finally {
    process.off("SIGINT", onSignal);
  }
}

export function createEasyIpCli(deps: EasyIpCliDeps = {}): Command {
  const io: CliIo = deps.io ?? {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  };
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const loadConfig = deps.loadConfig ?? (() => loadConfigFile());
  const createSession = deps.createSession ?? ((log: Logger) => new DiscoverySession({ log }));
  const openRegistry =
    deps.openRegistry ??
    ((opts: { missingThresholdMs: number; log: Logger }) =>
      DeviceRegistry.open(new FileRegistryStore(), opts));
  const listInterfaces = deps.listInterfaces ?? (() => listNetworkInterfaces());

  const print = (lines: readonly string[]) => {
    for (const line of lines) {
      io.out(line);
    }
  };
  const printJson = (value: unknown) => io.out(JSON.stringify(value, null, 2));

  // Errors end up as one line on stderr and a non-zero exit code.
  const run =
    <A extends unknown[]>(fn: (...args: A) => Promise<void>) =>
    async (...args: A) => {
      try {
        await fn(...args);
      } catch (err) {
        io.err(`error: ${describeError(err)}`);
        setExitCode(1);
      }
    };

  const withRegistry = async <T>(
    opts: { verbose?: boolean; missingHours?: number },
    fn: (registry: DeviceRegistry, config: ResolvedConfig, log: Logger) => Promise<T>,
  ): Promise<T> => {
    const config = await loadConfig();
    const log = createStderrLogger({ verbose: opts.verbose });
    const hours = opts.missingHours ?? config.registry.missingThresholdHours;
    const registry = await openRegistry({ missingThresholdMs: hours * HOUR_MS, log });
    return await fn(registry, config, log);
  };

  const program = new Command();
  program
    .name("easyip")
    .description("Discover Easy IP Setup cameras and recorders and track their addresses")
    .version("0.1.0")
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  // ── discovery ────────────────────────────────────────────
  addDiscoveryOptions(program.command("discover"))
    .description("Broadcast one search and print the devices that answer")
    .addOption(
      new Option("--sort <key>", "Sort order of the device table")
        .choices(DEVICE_SORT_KEYS)
        .default("ip"),
    )
    .action(
      run(async (opts: DiscoveryCliOptions & { sort: DeviceSortKey }) => {
        const config = await loadConfig();
        const log = createStderrLogger({ verbose: opts.verbose });
        const result = await withInterrupt((signal) =>
          createSession(log).run({
            interfaceAddress: opts.interface ?? config.discovery.interface,
            timeoutMs: opts.timeoutMs ?? config.discovery.timeoutMs,
            signal,
          }),
        );
        const devices = sortDevices(result.devices, opts.sort);
        if (opts.json) {
          printJson({
            count: devices.length,
            errorCount: result.errorCount,
            cancelled: result.cancelled,
            devices,
          });
          return;
        }
        print(formatDeviceTable(devices, detectIpConflicts(devices)));
        if (result.errorCount > 0) {
          io.out(`Ignored ${result.errorCount} malformed response(s).`);
        }
      }),
    );

  addDiscoveryOptions(program.command("scan"))
    .description("Discover devices and record them in the registry")
    .action(
      run(async (opts: DiscoveryCliOptions) => {
        await withRegistry(opts, async (registry, config, log) => {
          const tracker = new DeviceTracker({ registry, session: createSession(log), log });
          const outcome = await withInterrupt((signal) =>
            tracker.scan({
              interfaceAddress: opts.interface ?? config.discovery.interface,
              timeoutMs: opts.timeoutMs ?? config.discovery.timeoutMs,
              signal,
            }),
          );
          if (opts.json) {
            printJson({
              devices: outcome.devices.length,
              errorCount: outcome.errorCount,
              cancelled: outcome.cancelled,
              summary: outcome.summary,
            });
            return;
          }
          if (!outcome.reconciled) {
            io.out("Scan cancelled before any device answered; registry unchanged.");
            return;
          }
          if (outcome.cancelled) {
            io.out("Scan cancelled; partial results recorded.");
          }
          print(formatChangeSummary(outcome.summary));
        });
      }),
    );

  // ── registry ─────────────────────────────────────────────
  program
    .command("list")
    .description("List every device in the registry with its status")
    .addOption(
      new Option("--sort <key>", "Sort order").choices(RECORD_SORT_KEYS).default("last-seen"),
    )
    .option("--active-only", "Hide offline and missing devices")
    .option("--missing-hours <hours>", "Hours unseen before a device counts as missing", parsePositiveNumber)
    .option("--json", "Print machine-readable JSON")
    .action(
      run(
        async (opts: {
          sort: RecordSortKey;
          activeOnly?: boolean;
          missingHours?: number;
          json?: boolean;
        }) => {
          await withRegistry(opts, async (registry) => {
            const views = (await registry.listRecords(opts.sort)).filter(
              (v) => !opts.activeOnly || v.status === "active" || v.status === "ip-changed",
            );
            if (opts.json) {
              printJson({
                count: views.length,
                devices: views.map(({ record, status }) => ({ ...record, status })),
              });
              return;
            }
            if (views.length === 0) {
              io.out("No devices in registry.");
              return;
            }
            print(formatRecordTable(views));
          });
        },
      ),
    );

  program
    .command("history <mac>")
    .description("Show the IP address history of one device")
    .action(
      run(async (mac: string) => {
        await withRegistry({}, async (registry) => {
          print(formatHistory(await registry.getRecord(mac)));
        });
      }),
    );

  program
    .command("stats")
    .description("Summarize the registry")
    .action(
      run(async () => {
        await withRegistry({}, async (registry) => {
          const stats = await registry.stats();
          if (stats.total === 0) {
            io.out("No devices in registry.");
            return;
          }
          print(formatStats(stats));
        });
      }),
    );

  program
    .command("export")
    .description("Write every device record to a JSON file")
    .requiredOption("-o, --output <file>", "Destination file")
    .action(
      run(async (opts: { output: string }) => {
        await withRegistry({}, async (registry) => {
          const { devices } = await registry.snapshot();
          const target = path.resolve(opts.output);
          await writeJsonFileAtomically(target, devices);
          io.out(`Registry exported to ${target}`);
        });
      }),
    );

  // ── host ─────────────────────────────────────────────────
  program
    .command("interfaces")
    .description("List local interfaces a scan can be bound to")
    .action(
      run(async () => {
        print(formatInterfaces(listInterfaces()));
      }),
    );

  return program;
}
