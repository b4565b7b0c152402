#!/usr/bin/env node
import { consoleIo, main } from "./cli";

process.exitCode = main(process.argv.slice(2), consoleIo);
