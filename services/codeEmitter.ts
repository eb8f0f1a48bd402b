import type { ProgramNode, ProgramTree } from '../types';
import { BODY_SLOT, SLOT_PATTERN } from './catalogService';

export const EMPTY_PROGRAM_PLACEHOLDER = '// No blocks recognized yet. Take a clear photo of your blocks and try again.';

// Fill {{argument}} slots from the block's defaults. {{body}} is left in place.
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(SLOT_PATTERN, (slot: string, name: string) => {
    if (name === 'body') return slot;
    return Object.prototype.hasOwnProperty.call(values, name) ? values[name] : slot;
  });
}

export function renderNode(node: ProgramNode): string[] {
  const definition = node.block.definition;
  const lines = fillTemplate(definition.template, definition.defaults).split('\n');
  const slotLine = lines.findIndex((line) => line.trim() === BODY_SLOT);
  if (definition.role === 'leaf' || slotLine === -1) return lines;

  // Children take the indentation written in front of {{body}}
  const indent = lines[slotLine].slice(0, lines[slotLine].indexOf(BODY_SLOT));
  const body = node.children
    .flatMap(renderNode)
    .map((line) => (line.length > 0 ? indent + line : line));

  return [...lines.slice(0, slotLine), ...body, ...lines.slice(slotLine + 1)];
}

/**
 * Render a program tree as MakeCode JavaScript. Top-level scopes are
 * separated by a blank line; a tree with nothing to render yields the
 * placeholder comment instead of an empty string.
 */
export function emitProgram(tree: ProgramTree): string {
  const scopes = tree.roots
    .map((root) => renderNode(root).join('\n'))
    .filter((scope) => scope.trim().length > 0);
  return scopes.length > 0 ? scopes.join('\n\n') : EMPTY_PROGRAM_PLACEHOLDER;
}
