const CODE_BLOCK_RE = /```[\s\S]*?```/g;
const LINK_RE = /\[([^\]]+)\]\(([^)]+)\)/g;
const INLINE_CODE_RE = /`([^`]+)`/g;
const HEADING_RE = /^#{1,6}\s*/gm;
const BULLET_RE = /^[-*+]\s+/gm;
const NUMBERED_RE = /^\d+\.\s+/gm;
const QUOTE_RE = /^>\s?/gm;
const EMPHASIS_RE = /\*\*|__|~~|[*_]/g;

/** Flattens markdown into plain text fit for speech synthesis. */
export const stripMarkdown = (text: string): string => {
  if (!text) return '';
  return text
    .replace(CODE_BLOCK_RE, ' ')
    .replace(LINK_RE, '$1')
    .replace(INLINE_CODE_RE, '$1')
    .replace(HEADING_RE, '')
    .replace(BULLET_RE, '')
    .replace(NUMBERED_RE, '')
    .replace(QUOTE_RE, '')
    .replace(EMPHASIS_RE, '')
    .replace(/\s+/g, ' ')
    .trim();
};

export const splitSentences = (text: string): string[] =>
  text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
