#!/usr/bin/env tsx
import { runCli } from "./index";

runCli().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
