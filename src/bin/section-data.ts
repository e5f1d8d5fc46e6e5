#!/usr/bin/env node
// Perplexity Sectioner - section-data launcher

import "dotenv/config";
import { runSectionCli } from "../cli.js";

process.exitCode = await runSectionCli(process.argv.slice(2));
