/**
 * Merge command: layers one configuration file over another.
 */

import { fromDisk, toDisk } from '../../document/index.js';
import { interpolate } from '../../interpolate/index.js';
import { mergeWithDiagnostics } from '../../merge/index.js';
import { applyOverrides } from '../../parser/index.js';
import { render } from '../../serialize/index.js';
import { formatPath, type MergeDiagnostic } from '../../tree/index.js';
import { CliUsageError, parseCommandArgs } from '../args.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Describes a merge diagnostic in one line.
 *
 * @param diagnostic - The diagnostic to describe.
 * @returns A human-readable summary.
 */
export function describeDiagnostic(diagnostic: MergeDiagnostic): string {
  const location = formatPath(diagnostic.path);
  switch (diagnostic.kind) {
    case 'registry-replaced':
      return `${location}: replaced ${JSON.stringify(diagnostic.baseIdentity)} with ${JSON.stringify(diagnostic.overrideIdentity)}; base arguments dropped`;
    case 'placeholder-kept':
      return `${location}: kept ${diagnostic.placeholder}, ignored ${JSON.stringify(diagnostic.ignored)}`;
    case 'section-replaced':
      return `${location}: section and value conflict; override value used`;
  }
}

/**
 * Handles `cfgtree merge <base> <override> [--interpolate] [--order a,b] [--set path=value]... [--out file]`.
 *
 * Placeholders are kept through the merge and resolved afterwards when
 * interpolation is requested. Discarded data is logged as warnings.
 *
 * @param context - CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleMergeCommand(context: CliContext): Promise<CliCommandResult> {
  const options = parseCommandArgs(context.args);
  const [baseFile, overrideFile, ...extra] = options.positionals;
  if (baseFile === undefined || overrideFile === undefined || extra.length > 0) {
    throw new CliUsageError('merge expects a base file and an override file');
  }

  const logger = context.logger.child('merge');
  const base = await fromDisk(baseFile, { logger });
  const override = await fromDisk(overrideFile, { logger });

  const { tree: merged, diagnostics } = mergeWithDiagnostics(base, override);
  for (const diagnostic of diagnostics) {
    logger.warn('merge_diagnostic', {
      kind: diagnostic.kind,
      path: formatPath(diagnostic.path),
      message: describeDiagnostic(diagnostic),
    });
  }

  const shouldInterpolate = options.interpolate ?? context.settings.render.interpolate;
  let tree = shouldInterpolate ? interpolate(merged) : merged;
  tree = applyOverrides(tree, options.overrides);

  const sectionOrder = options.order ?? context.settings.render.section_order;
  if (options.out !== undefined) {
    await toDisk(options.out, tree, { sectionOrder, logger });
    logger.info('merged', { base: baseFile, override: overrideFile, destination: options.out });
  } else {
    process.stdout.write(render(tree, { sectionOrder }));
  }
  return { exitCode: 0 };
}
