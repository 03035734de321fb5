import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';
import type { SshConfig } from './ssh-config.js';

export const RenderOptionsSchema = z.object({
  indent: z.string().regex(/^[ \t]*$/, 'indent may only contain spaces and tabs').default('    '),
  blankLines: z.number().int().nonnegative().default(1),
});

export type RenderOptions = z.input<typeof RenderOptionsSchema>;

/**
 * Render a config back to ssh_config text.
 *
 * Each block becomes a `Host` line followed by one indented `Keyword value`
 * line per entry, in insertion order. `blankLines` empty lines separate
 * consecutive blocks; nothing follows the last one.
 */
export function render(config: SshConfig, options: RenderOptions = {}): string {
  const parsed = RenderOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(
      `Invalid render option ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'unknown error'}`,
    );
  }
  const { indent, blankLines } = parsed.data;
  const separator = '\n'.repeat(blankLines);

  return config.blocks
    .map(block => {
      if (block.hosts.size === 0) {
        throw new InvalidArgumentError('cannot render a Host block without patterns');
      }
      let text = `Host ${block.hosts.toString()}\n`;
      for (const [keyword, value] of block.keywords) {
        text += `${indent}${keyword} ${value}\n`;
      }
      return text;
    })
    .join(separator);
}
