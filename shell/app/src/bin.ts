#!/usr/bin/env tsx
import { runCLI } from "./cli";

process.on("unhandledRejection", (reason) => {
  console.error("❌ inkpost unhandled rejection:", reason);
  process.exit(1);
});

runCLI(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  cwd: process.cwd(),
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("❌ inkpost crashed:", error);
    process.exitCode = 1;
  });
