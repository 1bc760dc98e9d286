import type { Message } from './message.js';

const INDENT = '     ';

/**
 * Renders the structure of a Message tree, one attribute per line,
 * nested nodes indented under their parent.
 *
 * @param message - Root of the tree
 * @param prefix - Indentation for this level
 */
export function describeMessageStructure(message: Message, prefix: string = ''): string {
  let result = '';
  result += `${prefix}IDX: ${message.idx}\r\n`;
  result += `${prefix}Content-Type: ${message.header.get('Content-Type')}\r\n`;
  result += `${prefix}Is Multipart: ${message.isMultipart()}\r\n`;
  result += `${prefix}Is RFC822: ${message.isRfc822()}\r\n`;

  if (message.bodyMessage !== null) {
    prefix += INDENT;
    result += describeMessageStructure(message.bodyMessage, prefix);
  }

  result += `${prefix}Parts: ${message.parts.length}\r\n`;

  if (message.parts.length > 0) {
    prefix += INDENT;
    for (const part of message.parts) {
      result += describeMessageStructure(part, prefix);
    }
  }

  return result;
}
