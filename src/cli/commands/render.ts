/**
 * Render command: reads a configuration file and prints it in canonical form.
 */

import { fromDisk, toDisk } from '../../document/index.js';
import { render } from '../../serialize/index.js';
import { CliUsageError, parseCommandArgs } from '../args.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Handles `cfgtree render <file> [--interpolate] [--order a,b] [--set path=value]... [--out file]`.
 *
 * @param context - CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleRenderCommand(context: CliContext): Promise<CliCommandResult> {
  const options = parseCommandArgs(context.args);
  const [file, ...extra] = options.positionals;
  if (file === undefined || extra.length > 0) {
    throw new CliUsageError('render expects exactly one file');
  }

  const logger = context.logger.child('render');
  const tree = await fromDisk(file, {
    interpolate: options.interpolate ?? context.settings.render.interpolate,
    overrides: options.overrides,
    logger,
  });
  const sectionOrder = options.order ?? context.settings.render.section_order;

  if (options.out !== undefined) {
    await toDisk(options.out, tree, { sectionOrder, logger });
    logger.info('rendered', { source: file, destination: options.out });
  } else {
    process.stdout.write(render(tree, { sectionOrder }));
  }
  return { exitCode: 0 };
}
