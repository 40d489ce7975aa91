#!/usr/bin/env node
import process from "node:process";

import { runCli } from "../cli/index.js";

await runCli(process.argv);
