#!/usr/bin/env node
import { Terminal } from "./IO/terminal";
import { USAGE, parseArgs } from "./config";
import { CalculatorError, ConfigurationError } from "./errors";
import { Machine } from "./machine";
import { KeyProcessor } from "./processor";
import { RegisterBank } from "./register-bank";
import { loadScript } from "./script/loader";

function main(args: string[]) {
  const config = parseArgs(args);
  const machine = new Machine(
    new Terminal(),
    new KeyProcessor(new RegisterBank(), config.displayDigits),
    { verbose: config.verbose }
  );

  if (config.scriptPath === undefined) {
    machine.run();
    return;
  }
  machine.runScript(loadScript(config.scriptPath));
}

try {
  main(process.argv.slice(2));
} catch (error) {
  if (!(error instanceof CalculatorError)) throw error;
  console.error(`error: ${error.message}`);
  if (error instanceof ConfigurationError) {
    console.error(USAGE);
  }
  process.exitCode = 1;
}
