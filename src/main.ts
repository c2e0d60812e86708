#!/usr/bin/env node
import chalk from 'chalk';
import prompts from 'prompts';

import { runApp } from './app';
import { GitCli } from './gitStatus';
import { ConsoleSink } from './lineSink';
import { PatternStore } from './patternStore';
import { createStyles } from './treeRenderer';

async function confirmWithPrompt(message: string): Promise<boolean> {
  const response = await prompts({
    type: 'confirm',
    name: 'confirmed',
    message,
    initial: false,
  });
  return response.confirmed === true;
}

async function main(): Promise<void> {
  process.exitCode = await runApp(process.argv.slice(2), {
    sink: new ConsoleSink(),
    styles: createStyles(),
    oracle: new GitCli(),
    store: new PatternStore(),
    confirm: confirmWithPrompt,
  });
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red('Error:'), message);
  process.exit(1);
});
