#!/usr/bin/env node
import { runCli } from "./cli/run-cli";

process.exitCode = runCli({ argv: process.argv });
