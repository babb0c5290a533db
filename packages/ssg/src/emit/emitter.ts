/**
 * Site Emitter
 *
 * Writes a RenderPlan to disk. Everything goes into a staging directory beside the
 * output directory first; only a complete tree replaces the previous output, so a
 * failed run leaves the last good site (or nothing) in place.
 */

import { randomBytes } from "node:crypto";
import { mkdir, rename, rm } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { debug } from "@sssg/shared";
import { siteDiagnostic } from "../diagnostics.js";
import { OutputWriteError } from "../errors.js";
import type { RenderPlan } from "../render/index.js";
import { copyFileScoped, writeFileScoped } from "./writer.js";

export interface EmitResult {
  readonly outDir: string;
  /** Relative paths of written pages, in plan order. */
  readonly pages: readonly string[];
  /** Relative paths of copied assets, in plan order. */
  readonly assets: readonly string[];
}

/** Sibling path used while the new tree is being written. */
export function stagingPathFor(outDir: string, suffix: string): string {
  return join(dirname(outDir), `.${basename(outDir)}.staging-${suffix}`);
}

/**
 * Write all pages and copy all assets into `outDir`, replacing its previous contents.
 *
 * @throws OutputWriteError when any write, copy or the final swap fails; `outDir` is
 *   then left as it was before the call, unless putting it back failed as well, in
 *   which case the previous site stays in the backup directory the error names
 */
export async function emitSite(plan: RenderPlan, outDir: string): Promise<EmitResult> {
  const target = resolve(outDir);
  const suffix = `${process.pid}-${randomBytes(4).toString("hex")}`;
  const staging = stagingPathFor(target, suffix);
  const backup = join(dirname(target), `.${basename(target)}.previous-${suffix}`);

  debug.emit("staging", { target, staging });

  try {
    await mkdir(staging, { recursive: true });
    for (const page of plan.pages) {
      await writeFileScoped(join(staging, page.path), page.contents);
      debug.emit("page", { path: page.path });
    }
    for (const asset of plan.assets) {
      await copyFileScoped(asset.absolutePath, join(staging, asset.relativePath));
      debug.emit("asset", { path: asset.relativePath });
    }
  } catch (error) {
    await rm(staging, { recursive: true, force: true });
    throw writeError(`Could not write the site into ${target}`, error);
  }

  await swapIntoPlace(staging, target, backup);

  debug.emit("done", { target, pages: plan.pages.length, assets: plan.assets.length });
  return {
    outDir: target,
    pages: plan.pages.map((p) => p.path),
    assets: plan.assets.map((a) => a.relativePath),
  };
}

/**
 * Move the previous output aside, move the staged tree in, then drop the old one.
 * If the second move fails the previous output is restored; when that fails too,
 * both failures are reported and the backup is left where it is.
 */
async function swapIntoPlace(staging: string, target: string, backup: string): Promise<void> {
  let hadPrevious = false;
  try {
    await rename(target, backup);
    hadPrevious = true;
  } catch (error) {
    if (!isNotFound(error)) {
      await rm(staging, { recursive: true, force: true });
      throw writeError(`Could not replace ${target}`, error);
    }
  }

  try {
    await rename(staging, target);
  } catch (error) {
    await rm(staging, { recursive: true, force: true });
    const diagnostics = [siteDiagnostic("sssg/output-write", { message: describe(error) })];
    if (hadPrevious) {
      try {
        await rename(backup, target);
      } catch (restoreError) {
        debug.emit("swap.restore-failed", { backup, target });
        diagnostics.push(siteDiagnostic("sssg/output-write", {
          message: `previous site could not be put back and is kept at ${backup}: ${describe(restoreError)}`,
        }));
      }
    }
    throw new OutputWriteError(`Could not move the new site into ${target}`, diagnostics, { cause: error });
  }

  if (hadPrevious) {
    await rm(backup, { recursive: true, force: true });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function writeError(summary: string, error: unknown): OutputWriteError {
  return new OutputWriteError(summary, [
    siteDiagnostic("sssg/output-write", {
      message: describe(error),
    }),
  ], { cause: error });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
