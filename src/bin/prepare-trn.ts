#!/usr/bin/env node
// Perplexity Sectioner - prepare-trn launcher

import "dotenv/config";
import { runPrepareCli } from "../cli.js";

process.exitCode = await runPrepareCli(process.argv.slice(2));
