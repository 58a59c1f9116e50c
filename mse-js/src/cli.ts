#!/usr/bin/env node
/**
 * MSE CLI — Command-line inspection of MSE structured-text files.
 *
 * Commands:
 *   mse-read version  - Show the application version a file was written by
 *   mse-read outline  - Print every key of a file as a tree
 */

import { existsSync } from 'node:fs';
import { MessageQueue } from './messages.js';
import { formatOutline, outlineToJSON, readOutline } from './outline.js';
import { Reader } from './reader.js';
import { APP_VERSION } from './types.js';

function printUsage(): void {
  console.log('mse-read - MSE structured-text inspector\n');
  console.log('Usage:');
  console.log('  mse-read version set.mse');
  console.log('  mse-read outline set.mse');
  console.log('  mse-read outline set.mse --strict --json');
  console.log();
  console.log("Run 'mse-read <command> --help' for details on any command.");
  console.log("Run 'mse-read --version' for version info.");
}

function hasFlag(args: string[], flag: string, shortFlag?: string): boolean {
  return args.includes(flag) || (shortFlag ? args.includes(shortFlag) : false);
}

function getPositional(args: string[]): string[] {
  return args.filter((arg) => !arg.startsWith('-'));
}

/** Print what the queue collected, one message per entry, to stderr. */
function printMessages(queue: MessageQueue): void {
  for (const message of queue.drain()) {
    console.error(`${message.severity === 'warning' ? 'Warning' : 'Note'}: ${message.text}`);
  }
}

function openReader(path: string, strict: boolean, queue: MessageQueue): Reader {
  if (!existsSync(path)) {
    console.error(`Error: File not found: ${path}`);
    process.exit(1);
  }
  return Reader.fromFile(path, { ignoreInvalid: !strict, messages: queue });
}

function cmdVersion(args: string[]): void {
  if (hasFlag(args, '--help', '-h')) {
    console.log('Usage: mse-read version <path>');
    return;
  }
  const pos = getPositional(args);
  if (pos.length === 0) {
    console.error('Usage: mse-read version <path>');
    process.exit(1);
  }
  const queue = new MessageQueue();
  const reader = openReader(pos[0], false, queue);
  console.log(`${pos[0]}: ${reader.fileAppVersion}`);
  printMessages(queue);
}

function cmdOutline(args: string[]): void {
  if (hasFlag(args, '--help', '-h')) {
    console.log('Usage: mse-read outline <path> [--strict] [--json]');
    console.log();
    console.log('Options:');
    console.log('  -s, --strict   Report indentation problems and unexpected keys');
    console.log('  -j, --json     Print the outline as JSON');
    return;
  }
  const pos = getPositional(args);
  if (pos.length === 0) {
    console.error('Usage: mse-read outline <path> [--strict] [--json]');
    process.exit(1);
  }
  const queue = new MessageQueue();
  const reader = openReader(pos[0], hasFlag(args, '--strict', '-s'), queue);
  const nodes = readOutline(reader);
  reader.showWarnings();
  if (hasFlag(args, '--json', '-j')) {
    console.log(outlineToJSON(nodes));
  } else {
    console.log(formatOutline(nodes));
  }
  printMessages(queue);
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printUsage();
    process.exit(0);
  }

  if (args[0] === '--version' || args[0] === '-v' || args[0] === '-V') {
    console.log(`mse-read ${APP_VERSION}`);
    return;
  }
  if (args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return;
  }

  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case 'version':
      cmdVersion(rest);
      break;
    case 'outline':
      cmdOutline(rest);
      break;
    default:
      console.error(`Unknown command: ${command}`);
      console.error("Run 'mse-read --help' for usage.");
      process.exit(1);
  }
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
