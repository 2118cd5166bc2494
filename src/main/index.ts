#!/usr/bin/env node
import os from "node:os";
import path from "node:path";
import { parseArgs } from "node:util";
import { APP_NAME } from "../shared/constants.js";
import { describeError } from "../shared/errors.js";
import { formatDuration } from "../shared/format.js";
import { attachReporters } from "./cli-reporters.js";
import { AppController } from "./services/app-controller.js";

type SaveOutcome = { ok: true; path: string } | { ok: false; error: unknown };

function resolveDataDir(): string {
  const override = process.env.PLAYLIST_ENGINE_HOME;
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), `.${APP_NAME}`);
}

async function savePlaylist(controller: AppController, target: string): Promise<SaveOutcome> {
  const resolved = path.resolve(target);
  try {
    await controller.mutator.savePlaylist(resolved);
    return { ok: true, path: resolved };
  } catch (error) {
    return { ok: false, error };
  }
}

async function run(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      save: { type: "string" },
      help: { type: "boolean", short: "h" }
    },
    allowPositionals: true
  });

  if (values.help) {
    console.log(`Usage: ${APP_NAME} [--save <file.m3u>] <paths...>`);
    return 0;
  }

  const controller = new AppController({ dataDir: resolveDataDir() });
  await controller.init();
  const detachReporters = attachReporters(controller.bus);

  let exitCode = 0;
  try {
    controller.launch(positionals.map((entry) => path.resolve(entry)));
    await controller.whenIdle();

    const summary = controller.summary();
    console.log(`Playlist: ${summary.size} track(s), ${formatDuration(summary.totalDurationSec)}`);

    if (values.save) {
      const outcome = await savePlaylist(controller, values.save);
      if (outcome.ok) {
        console.log(`Saved playlist to ${outcome.path}`);
      } else {
        console.error("Failed to save playlist:", describeError(outcome.error));
        exitCode = 1;
      }
    }
  } finally {
    detachReporters();
    await controller.shutdown();
  }

  return exitCode;
}

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal bootstrap failure:", error);
    process.exitCode = 1;
  });
