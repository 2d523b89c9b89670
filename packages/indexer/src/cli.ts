#!/usr/bin/env node
// vecsync-indexer entry

import { createCliProgram } from "./program.js";

await createCliProgram().parseAsync(process.argv);
