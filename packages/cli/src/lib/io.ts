/**
 * I/O helpers for CLI
 *
 * Commands never touch process streams directly; they go through a `CliIO`
 * so that the program can run in-process under test.
 */

import * as fs from "node:fs/promises";
import type { Env } from "./env.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Read all of stdin */
  readStdin(): Promise<string>;
  stdinIsTTY: boolean;
  stderrIsTTY: boolean;
  env: Env;
}

/**
 * Read from a stream with size limit (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStream(
  stream: NodeJS.ReadableStream,
  maxBytes = 10 * 1024 * 1024
): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    stream.setEncoding("utf8");

    stream.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        stream.pause();
        stream.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    stream.on("end", () => resolve(data));
    stream.on("error", reject);
  });
}

/**
 * Read a UTF-8 text file
 */
export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

/**
 * IO bound to the real process streams
 */
export function processIO(): CliIO {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    readStdin: () => readStream(process.stdin),
    stdinIsTTY: process.stdin.isTTY ?? false,
    stderrIsTTY: process.stderr.isTTY ?? false,
    env: process.env,
  };
}
