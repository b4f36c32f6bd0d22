#!/usr/bin/env node
import { createProgram } from "./cli";

// errors from generation are left uncaught: non-zero exit with the trace
createProgram().parse(process.argv);
