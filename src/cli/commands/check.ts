/**
 * Check command: verifies that a file parses and every placeholder resolves.
 */

import { fromDisk } from '../../document/index.js';
import { interpolate } from '../../interpolate/index.js';
import { applyOverrides } from '../../parser/index.js';
import { findRegistryReferences } from '../../registry/index.js';
import { formatPath } from '../../tree/index.js';
import { CliUsageError, parseCommandArgs } from '../args.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Handles `cfgtree check <file> [--set path=value]...`.
 *
 * Overrides are applied before references are resolved, so a check covers
 * the values a run would actually use. Prints one line per
 * registered-function block, read from the uninterpolated tree so the names
 * appear as written.
 *
 * @param context - CLI context.
 * @returns A promise resolving to the command result.
 * @throws ConfigParseError, UnresolvedReferenceError or InterpolationCycleError
 * when the file is invalid.
 * @throws ConfigOverrideError if a `--set` path does not exist.
 */
export async function handleCheckCommand(context: CliContext): Promise<CliCommandResult> {
  const options = parseCommandArgs(context.args);
  const [file, ...extra] = options.positionals;
  if (file === undefined || extra.length > 0) {
    throw new CliUsageError('check expects exactly one file');
  }
  if (options.out !== undefined || options.order !== undefined || options.interpolate !== undefined) {
    throw new CliUsageError('check does not write output; it accepts only --set');
  }

  const tree = applyOverrides(
    await fromDisk(file, { logger: context.logger.child('check') }),
    options.overrides
  );
  interpolate(tree);

  const references = findRegistryReferences(tree);
  console.log(`OK: ${file}`);
  for (const reference of references) {
    console.log(
      `  [${formatPath(reference.path)}] @${reference.namespace} = ${JSON.stringify(reference.name)}`
    );
  }
  return { exitCode: 0 };
}
