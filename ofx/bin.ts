#!/usr/bin/env node
// Copyright 2018-2026 the Deno authors. MIT license.

import { main } from "./cli.js";

process.exitCode = await main(process.argv.slice(2), process);
