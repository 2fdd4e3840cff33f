import { splitSentences, stripMarkdown } from '../speech-text';

describe('stripMarkdown', () => {
  it('flattens common markdown to speakable text', () => {
    expect(stripMarkdown('## Title\n- **bold** item with `code` and [link](http://x)')).toBe(
      'Title bold item with code and link',
    );
  });

  it('drops fenced code blocks', () => {
    expect(stripMarkdown('Run this:\n```\nnpm test\n```\nthen wait.')).toBe('Run this: then wait.');
  });
});

describe('splitSentences', () => {
  it('splits on terminal punctuation', () => {
    expect(splitSentences('Hi there. How are you? Fine!')).toEqual(['Hi there.', 'How are you?', 'Fine!']);
  });

  it('keeps trailing text without punctuation', () => {
    expect(splitSentences('Done. almost')).toEqual(['Done.', 'almost']);
  });
});
