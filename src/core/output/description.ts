import { marked, type Token, type Tokens } from 'marked';

/** The description limit is counted in UTF-8 bytes. */
export const MAX_DESCRIPTION_BYTES = 5000;

const ELLIPSIS = '...';

/**
 * Flattens the markdown report into the plain text a video description
 * accepts. Bullet markers are dropped so chapter lines start with their
 * timestamp; angle brackets are removed because the platform rejects them.
 */
export function toPlainDescription(markdown: string, maxBytes: number = MAX_DESCRIPTION_BYTES): string {
  const tokens = marked.lexer(markdown, { gfm: true });
  const blocks = renderBlocks(tokens);
  const text = decodeEntities(blocks.join('\n\n'))
    .replace(/[<>]/g, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  return truncate(text, maxBytes);
}

function renderBlocks(tokens: Token[]): string[] {
  const blocks: string[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'heading':
        blocks.push(renderInline((token as Tokens.Heading).tokens));
        break;
      case 'paragraph':
        blocks.push(renderInline((token as Tokens.Paragraph).tokens));
        break;
      case 'list':
        blocks.push(renderList(token as Tokens.List));
        break;
      case 'code':
        blocks.push((token as Tokens.Code).text);
        break;
      case 'blockquote':
        blocks.push(...renderBlocks((token as Tokens.Blockquote).tokens));
        break;
      case 'text': {
        const textToken = token as Tokens.Text;
        blocks.push(textToken.tokens ? renderInline(textToken.tokens) : textToken.text);
        break;
      }
      case 'space':
      case 'hr':
        break;
      default:
        if ('text' in token && typeof token.text === 'string') {
          blocks.push(token.text);
        }
    }
  }

  return blocks;
}

function renderList(list: Tokens.List): string {
  const start = typeof list.start === 'number' ? list.start : 1;

  return list.items
    .map((item, index) => {
      const content = renderBlocks(item.tokens).join('\n');
      return list.ordered ? `${start + index}. ${content}` : content;
    })
    .join('\n');
}

function renderInline(tokens: Token[] | undefined): string {
  if (!tokens) return '';

  let result = '';
  for (const token of tokens) {
    switch (token.type) {
      case 'strong':
      case 'em':
      case 'del':
        result += renderInline((token as Tokens.Strong).tokens);
        break;
      case 'link': {
        const link = token as Tokens.Link;
        const text = renderInline(link.tokens);
        result += text && text !== link.href ? `${text}: ${link.href}` : link.href;
        break;
      }
      case 'br':
        result += '\n';
        break;
      case 'text': {
        const textToken = token as Tokens.Text;
        result += textToken.tokens ? renderInline(textToken.tokens) : textToken.text;
        break;
      }
      default:
        if ('text' in token && typeof token.text === 'string') {
          result += token.text;
        }
    }
  }
  return result;
}

function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, '&');
}

/** Cuts on code point boundaries so no surrogate pair is split. */
function truncate(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf-8') <= maxBytes) return text;

  const budget = maxBytes - ELLIPSIS.length;
  let kept = '';
  let used = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char, 'utf-8');
    if (used + size > budget) break;
    kept += char;
    used += size;
  }
  return `${kept.trimEnd()}${ELLIPSIS}`;
}
