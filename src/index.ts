#!/usr/bin/env node
import "dotenv/config";
import { hideBin } from "yargs/helpers";

import { runCli } from "./cli.js";
import { getConfig } from "./utils/config.js";
import { flushSentry, initSentry } from "./utils/sentry.js";

const config = getConfig();
initSentry(config.sentryDsn);

process.exitCode = await runCli(hideBin(process.argv), config);
await flushSentry();
