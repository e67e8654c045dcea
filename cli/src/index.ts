#!/usr/bin/env node
import { getErrorMessage } from "../../src/utils/error-utils";

import { run } from "./program";

async function main() {
  process.exitCode = await run(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(getErrorMessage(error));
  process.exit(1);
});
