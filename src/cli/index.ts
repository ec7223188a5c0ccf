#!/usr/bin/env node

import fs from "fs";
import path from "path";
import { ConfigError } from "../core/config.js";
import { OrchestratorError } from "../core/errors.js";
import { parseArgs, UsageError } from "./args.js";

function readVersion(): string {
  let dir = import.meta.dirname;
  for (;;) {
    const pkgPath = path.join(dir, "package.json");
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) return "unknown";
    dir = parent;
  }
}

function usage(): void {
  console.log("Usage: phaseloop <command> [--workspace <dir>] [--log-level <level>]\n");
  console.log("Commands:");
  console.log("  start --project <id> --mode <genesis|phoenix|saas>   Run a project's phases, then evolve it");
  console.log("        [--name <name>] [--workdir <dir>] [--no-evolve] [--every <duration> | --cron <expr> [--tz <zone>]]");
  console.log("  status --project <id>                                  Show phase and schedule state");
  console.log("  schedule stop --project <id>                           Stop a project's evolution schedule");
  console.log("  reset --project <id>                                   Mark every phase pending again");
  console.log("  evolve --project <id>                                  Run one evolution cycle now");
  console.log("  sessions --project <id>                                List agent sessions");
  console.log("  cycles --project <id>                                  List evolution cycles");
}

async function main(argv: string[]): Promise<number> {
  const first = argv[0];
  if (first === "--version" || first === "-v") {
    console.log(`phaseloop ${readVersion()}`);
    return 0;
  }

  const args = parseArgs(argv);
  switch (args.positionals[0]) {
    case "start": {
      const { run } = await import("./commands/start.js");
      return run(args);
    }
    case "status": {
      const { run } = await import("./commands/status.js");
      return run(args);
    }
    case "schedule": {
      const { run } = await import("./commands/schedule.js");
      return run(args);
    }
    case "reset": {
      const { run } = await import("./commands/reset.js");
      return run(args);
    }
    case "evolve": {
      const { run } = await import("./commands/evolve.js");
      return run(args);
    }
    case "sessions": {
      const { run } = await import("./commands/sessions.js");
      return run(args);
    }
    case "cycles": {
      const { run } = await import("./commands/cycles.js");
      return run(args);
    }
    default:
      usage();
      return args.positionals[0] === undefined ? 0 : 2;
  }
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (err) {
  if (err instanceof UsageError) {
    console.error(err.message);
    process.exitCode = 2;
  } else if (err instanceof OrchestratorError || err instanceof ConfigError) {
    console.error(err.message);
    process.exitCode = 1;
  } else {
    console.error(err);
    process.exitCode = 1;
  }
}
