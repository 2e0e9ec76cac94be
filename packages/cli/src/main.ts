#!/usr/bin/env node
import { run } from "./cli";

async function main(): Promise<void> {
  const code = await run({
    argv: process.argv.slice(2),
    env: process.env,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
  process.exit(code);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
