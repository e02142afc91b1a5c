/**
 * Describe command - Print the tool descriptor the controller negotiates with.
 */

import { BashTool } from '../../tools/bash-tool.ts';
import { resolveToolOptions, type GlobalOptions } from './options.ts';

export function describeCommand(options: GlobalOptions): void {
  const tool = new BashTool(resolveToolOptions(options));
  console.log(JSON.stringify(tool.describe(), null, 2));
}
