import { Effect } from "effect";
import * as crypto from "crypto";
import * as fs from "fs/promises";
import * as path from "path";
import archiver from "archiver";
import { globSync } from "glob";

export type PackageInput = {
  /** Function sources, copied as-is */
  sourceDir: string;
  /** Scratch directory, wiped at the start of every run and left behind afterwards */
  stagingDir: string;
  /** Zip written here, replacing whatever was there */
  archiveFile: string;
};

export type PackagedArtifact = {
  archivePath: string;
  size: number;
  /** Base64 SHA-256 of the zip, comparable with Lambda's CodeSha256 */
  sha256: string;
  files: string[];
};

// Fixed date for deterministic zip (same content = same hash)
const FIXED_DATE = new Date(0);

const messageOf = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const fsStep = <A>(description: string, run: () => Promise<A>) =>
  Effect.tryPromise({
    try: run,
    catch: (error) => new Error(`${description}: ${messageOf(error)}`, { cause: error }),
  });

export const computeCodeHash = (code: Uint8Array): string =>
  crypto.createHash("sha256").update(code).digest("base64");

/**
 * Replace the staging directory with a fresh copy of the source tree.
 */
export const stageSources = (sourceDir: string, stagingDir: string) =>
  Effect.gen(function* () {
    yield* fsStep(`Failed to clear ${stagingDir}`, () => fs.rm(stagingDir, { recursive: true, force: true }));
    yield* fsStep(`Failed to create ${stagingDir}`, () => fs.mkdir(stagingDir, { recursive: true }));

    const source = yield* fsStep(`Source directory ${sourceDir} is not readable`, () => fs.stat(sourceDir));
    if (!source.isDirectory()) {
      return yield* Effect.fail(new Error(`Source directory ${sourceDir} is not a directory`));
    }

    yield* fsStep(`Failed to copy ${sourceDir}`, () => fs.cp(sourceDir, stagingDir, { recursive: true }));
    yield* Effect.logDebug(`Staged ${sourceDir} into ${stagingDir}`);
  });

/**
 * Zip every file under a directory, paths relative to it.
 * Entries are sorted and carry a fixed date, so the same tree always gives the same bytes.
 */
export const zipDirectory = (dir: string) =>
  Effect.gen(function* () {
    const files = globSync("**/*", { cwd: dir, nodir: true, dot: true, posix: true }).sort();

    const buffer = yield* fsStep(`Failed to compress ${dir}`, () =>
      new Promise<Buffer>((resolve, reject) => {
        const chunks: Buffer[] = [];
        const archive = archiver("zip", { zlib: { level: 9 } });

        archive.on("data", (chunk: Buffer) => chunks.push(chunk));
        archive.on("end", () => resolve(Buffer.concat(chunks)));
        archive.on("error", reject);

        for (const file of files) {
          archive.file(path.join(dir, file), { name: file, date: FIXED_DATE });
        }
        archive.finalize().catch(reject);
      })
    );

    return { buffer, files };
  });

/**
 * Build the function archive from scratch: stage the sources, then zip the staging directory.
 */
export const packageFunction = (input: PackageInput) =>
  Effect.gen(function* () {
    yield* stageSources(input.sourceDir, input.stagingDir);

    const { buffer, files } = yield* zipDirectory(input.stagingDir);

    yield* fsStep(`Failed to write ${input.archiveFile}`, async () => {
      await fs.mkdir(path.dirname(input.archiveFile), { recursive: true });
      await fs.writeFile(input.archiveFile, buffer);
    });

    yield* Effect.logInfo(`Packaged ${files.length} file(s) into ${input.archiveFile} (${(buffer.length / 1024).toFixed(1)} KB)`);

    return {
      archivePath: input.archiveFile,
      size: buffer.length,
      sha256: computeCodeHash(buffer),
      files,
    } satisfies PackagedArtifact;
  });
