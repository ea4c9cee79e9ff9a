/**
 * Generate command - turn a workflow manifest and component code into a
 * standalone Python script
 */

import * as fs from 'fs';
import * as path from 'path';
import { assembleScript } from '../../generator/assembler.js';
import { defaultContext, readCodeFiles, readManifestFile, type CommandContext } from './shared.js';

export interface GenerateOptions {
  /** Component source files, concatenated in order */
  code: string[];
  /** Output file; stdout when omitted */
  output?: string;
  /** Require every invoked function to be defined exactly once */
  strict?: boolean;
}

/**
 * @example
 * ```bash
 * pipesmith generate workflow.json --code components/*.py -o pipeline.py
 * pipesmith generate workflow.json --code components.py --strict > pipeline.py
 * ```
 */
export async function generateCommand(
  manifestPath: string,
  options: GenerateOptions,
  context: CommandContext = defaultContext()
): Promise<string> {
  const manifest = readManifestFile(manifestPath);
  const bodyText = readCodeFiles(options.code);
  const script = assembleScript(manifest, bodyText, { now: context.now, strict: options.strict });

  if (!options.output) {
    context.write(script);
    return script;
  }

  const outputPath = path.resolve(options.output);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, script, 'utf8');
  context.logger.success(`Generated ${outputPath} (${manifest.nodes.length} components)`);
  return script;
}
