#!/usr/bin/env node
import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import updateNotifier from "update-notifier";
import { createProgram } from "./program.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkgPath = [join(__dirname, "../../package.json"), join(__dirname, "../package.json")].find(
  (p) => existsSync(p),
);
if (!pkgPath) {
  throw new Error("package.json not found next to the CLI");
}
const pkg = JSON.parse(readFileSync(pkgPath, "utf-8")) as { name: string; version: string };
updateNotifier({ pkg }).notify();

createProgram(pkg.version).parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
