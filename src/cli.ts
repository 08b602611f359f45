import fs from "node:fs";
import path from "node:path";
import { Command, CommanderError } from "commander";
import { runAddApn, runListApns, runRemoveApn } from "./commands/apn";
import { runAddSubscriber, runListSubscribers, runRemoveSubscriber } from "./commands/subscriber";
import { completionScriptFor } from "./completion";
import { type Env, fallbackOptionsFromArgv, type RawGlobalOptions, resolveConfig } from "./config";
import { type CliError, exitCodeForError, toCliError, UsageError } from "./errors";
import { emitDebug, emitError, emitSuccess } from "./output";
import {
  collectRepeatable,
  parseBandwidth,
  parseNonNegativeIntOption,
  parsePositiveIntOption,
  resolveDisplay
} from "./parser";
import type { CliConfig, CommandResult, FetchFn, RequestContext } from "./types";

export type CliRuntime = {
  env: Env;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
};

export type RunState = {
  argv: string[];
  exitCode: number;
};

type ListFlags = { long?: boolean; brief?: boolean; id?: boolean };

function readVersion(): string {
  try {
    const pkgPath = path.resolve(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function sharedFlags(command: Command): Command {
  command
    .option("--api <url>", "HSS API base URL (env PYHSS_API, default http://127.0.0.1:8080)")
    .option("--api-key <key>", "Provisioning key sent with every request (env PYHSS_APIKEY)")
    .option("--json", "Machine-readable JSON envelope")
    .option("-q, --quiet", "Suppress non-critical diagnostics")
    .option("-v, --verbose", "Show extra diagnostics on stderr")
    .option("--timeout-ms <N>", "Network timeout in milliseconds", parsePositiveIntOption("timeout-ms"));
  return command;
}

function listFlags(command: Command): Command {
  return command
    .option("-l, --long", "Long output, show all fields")
    .option("-b, --brief", "Brief output, show a fixed subset of fields")
    .option("-i, --id", "Show only the key of each record (default)");
}

function requestContext(config: CliConfig, runtime: CliRuntime): RequestContext {
  return {
    api: config.api,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
    verbose: config.verbose,
    signal: runtime.signal,
    fetchFn: runtime.fetchFn
  };
}

async function runHandled(
  commandName: string,
  command: Command,
  runtime: CliRuntime,
  state: RunState,
  action: (request: RequestContext, config: CliConfig) => Promise<CommandResult>
): Promise<void> {
  let config: CliConfig;
  try {
    config = resolveConfig(command.optsWithGlobals<RawGlobalOptions>(), runtime.env);
  } catch (err) {
    const cliErr = toCliError(err);
    emitError(cliErr, fallbackOptionsFromArgv(state.argv));
    state.exitCode = exitCodeForError(cliErr);
    return;
  }

  emitDebug(config.verbose, `${commandName} against ${config.api}${config.apiKey ? " (with API key)" : ""}`);
  try {
    const result = await action(requestContext(config, runtime), config);
    emitSuccess(commandName, result, config);
  } catch (err) {
    const cliErr = toCliError(err);
    emitError(cliErr, config);
    state.exitCode = exitCodeForError(cliErr);
  }
}

export function createProgram(runtime: CliRuntime, state: RunState): Command {
  const program = sharedFlags(new Command());
  program
    .name("hssctl")
    .description("Manage subscribers and APNs of an HSS/PCRF through its REST API")
    .version(readVersion(), "--version", "Output version")
    .configureOutput({
      outputError: () => {
        // Errors are formatted through emitError for consistent exit code mapping.
      }
    })
    .exitOverride();

  listFlags(sharedFlags(program.command("list-subscribers")))
    .description("List subscribers")
    .option("--imsi <imsi>", "Show only this subscriber (brief output unless -l or -i)")
    .option("--limit <N>", "Page size", parsePositiveIntOption("limit"))
    .option("--page <N>", "Page number (0-based)", parseNonNegativeIntOption("page"))
    .action(async (options: ListFlags & { imsi?: string; limit?: number; page?: number }, command: Command) => {
      await runHandled("list-subscribers", command, runtime, state, async (request) =>
        runListSubscribers({
          display: resolveDisplay(options, options.imsi === undefined ? "id" : "brief"),
          imsi: options.imsi,
          limit: options.limit,
          page: options.page,
          request
        })
      );
    });

  sharedFlags(program.command("add-subscriber"))
    .description("Add a subscriber")
    .argument("<imsi>", "IMSI of the subscriber")
    .requiredOption("--ki <hex>", "Authentication key Ki as hex string")
    .requiredOption("--opc <hex>", "Operator variant key OPc as hex string")
    .option("--msisdn <num>", "MSISDN of the subscriber")
    .option("--iccid <iccid>", "ICCID of the SIM")
    .option("--sqn <N>", "Initial authentication sequence number", parseNonNegativeIntOption("sqn"))
    .requiredOption("--default-apn <name>", "Default APN of the subscriber")
    .option("--apn <name>", "Additional allowed APN (repeatable)", collectRepeatable, [])
    .action(
      async (
        imsi: string,
        options: {
          ki: string;
          opc: string;
          msisdn?: string;
          iccid?: string;
          sqn?: number;
          defaultApn: string;
          apn: string[];
        },
        command: Command
      ) => {
        await runHandled("add-subscriber", command, runtime, state, async (request) =>
          runAddSubscriber(imsi, {
            ki: options.ki,
            opc: options.opc,
            msisdn: options.msisdn,
            iccid: options.iccid,
            sqn: options.sqn,
            defaultApn: options.defaultApn,
            apn: options.apn,
            request
          })
        );
      }
    );

  sharedFlags(program.command("remove-subscriber"))
    .description("Remove a subscriber")
    .argument("<imsi>", "IMSI of the subscriber")
    .action(async (imsi: string, _options: unknown, command: Command) => {
      await runHandled("remove-subscriber", command, runtime, state, async (request) =>
        runRemoveSubscriber(imsi, { request })
      );
    });

  listFlags(sharedFlags(program.command("list-apns")))
    .description("List APNs")
    .option("--apn <name>", "Show only this APN (brief output unless -l or -i)")
    .action(async (options: ListFlags & { apn?: string }, command: Command) => {
      await runHandled("list-apns", command, runtime, state, async (request) =>
        runListApns({
          display: resolveDisplay(options, options.apn === undefined ? "id" : "brief"),
          name: options.apn,
          request
        })
      );
    });

  sharedFlags(program.command("add-apn"))
    .description("Add an APN")
    .argument("<name>", "APN name")
    .option("--dl <bw>", "APN AMBR downlink, e.g. 150mbit", parseBandwidth)
    .option("--ul <bw>", "APN AMBR uplink, e.g. 50mbit", parseBandwidth)
    .option("--qci <N>", "QoS class identifier", parsePositiveIntOption("qci"))
    .option("--arp <N>", "ARP priority level", parsePositiveIntOption("arp"))
    .option("--preemption-cap", "APN may preempt other bearers (ARP)")
    .option("--preemption-vuln", "APN may be preempted by other bearers (ARP)")
    .option("--no-preemption-vuln", "APN may not be preempted (ARP)")
    .action(
      async (
        name: string,
        options: {
          dl?: number;
          ul?: number;
          qci?: number;
          arp?: number;
          preemptionCap?: boolean;
          preemptionVuln?: boolean;
        },
        command: Command
      ) => {
        await runHandled("add-apn", command, runtime, state, async (request) =>
          runAddApn(name, {
            dl: options.dl,
            ul: options.ul,
            qci: options.qci,
            arp: options.arp,
            preemptionCap: options.preemptionCap,
            preemptionVuln: options.preemptionVuln,
            request
          })
        );
      }
    );

  sharedFlags(program.command("remove-apn"))
    .description("Remove an APN")
    .argument("<name>", "APN name")
    .action(async (name: string, _options: unknown, command: Command) => {
      await runHandled("remove-apn", command, runtime, state, async (request) => runRemoveApn(name, { request }));
    });

  sharedFlags(program.command("completion"))
    .description("Print a shell completion script")
    .argument("<shell>", "bash|zsh|fish")
    .action(async (shell: string, _options: unknown, command: Command) => {
      await runHandled("completion", command, runtime, state, async () => {
        const script = completionScriptFor(shell);
        return {
          data: { shell, script },
          human: script.trimEnd().split("\n")
        };
      });
    });

  return program;
}

function isCleanExit(err: CommanderError): boolean {
  if (err.code === "commander.helpDisplayed" || err.code === "commander.version") return true;
  return err.code === "commander.help" && err.exitCode === 0;
}

/** Parses argv, runs the selected command and resolves with the process exit code. */
export async function runCli(argv: string[], runtime: CliRuntime): Promise<number> {
  const state: RunState = { argv, exitCode: 0 };
  const program = createProgram(runtime, state);
  try {
    await program.parseAsync(argv);
    return state.exitCode;
  } catch (err) {
    const opts = fallbackOptionsFromArgv(argv);
    if (err instanceof CommanderError) {
      if (isCleanExit(err)) return 0;
      // help has already gone to stderr when no command was given
      const cliErr: CliError = err.code === "commander.help"
        ? new UsageError("Missing command.")
        : new UsageError(err.message.replace(/^error:\s*/i, ""), {
            hint: "Run with --help to see usage."
          });
      emitError(cliErr, opts);
      return exitCodeForError(cliErr);
    }
    const cliErr = toCliError(err);
    emitError(cliErr, opts);
    return exitCodeForError(cliErr);
  }
}
