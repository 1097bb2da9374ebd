// List known models

import chalk from 'chalk';
import { defaultModelRegistry, type ModelProfile } from '../../context/models.js';

export function formatModelTable(profiles: readonly ModelProfile[]): string[] {
  const width = Math.max(5, ...profiles.map(p => p.name.length));
  const lines = [`${'Model'.padEnd(width)}  ${'Window'.padStart(9)}  ${'Counting'.padEnd(10)}  Kind`];
  for (const profile of profiles) {
    lines.push(
      `${profile.name.padEnd(width)}  ${String(profile.contextWindow).padStart(9)}  ${profile.countingStrategy.padEnd(10)}  ${profile.kind}`
    );
  }
  return lines;
}

export async function modelsCommand(options: { json?: boolean }): Promise<void> {
  const profiles = defaultModelRegistry.list();
  if (options.json) {
    console.log(JSON.stringify(profiles, null, 2));
    return;
  }
  const [header, ...rows] = formatModelTable(profiles);
  console.log(chalk.bold(header));
  for (const row of rows) {
    console.log(row);
  }
  console.log(chalk.gray('\nUnknown models get a 4096-token window.'));
}
