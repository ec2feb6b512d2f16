/**
 * Interactive Environment Browser
 */

import { c } from '../colors.js';
import { BACK, orBack, select, Separator } from '../prompts.js';
import { formatEnvironmentRow, printEnvironmentDetails, printEnvironmentList, printHeader } from '../ui.js';
import type { ScanResults } from '../locators/index.js';

const EXIT = '__exit__';

export async function browseEnvironments(results: ScanResults): Promise<void> {
  printHeader();
  printEnvironmentList(results);

  if (results.environments.length === 0) {
    return;
  }

  while (true) {
    const choice = await orBack(
      select({
        message: 'Select an environment',
        choices: [
          ...results.environments.map((env) => ({
            name: formatEnvironmentRow(env),
            value: env.pythonExecutablePath,
          })),
          new Separator(),
          { name: 'Exit', value: EXIT },
        ],
        pageSize: 15,
        loop: false,
        theme: { prefix: '  ' },
      })
    );

    if (choice === BACK || choice === EXIT) {
      return;
    }

    const env = results.environments.find((e) => e.pythonExecutablePath === choice);
    if (!env) {
      console.log(`  ${c('red', '✗')} Environment no longer available: ${choice}`);
      continue;
    }

    printEnvironmentDetails(env);
  }
}
