import { describe, expect, it } from 'vitest';
import { analyzeStructure } from './structure_analysis';

const ARTICLE = `# A Title

Meta description: short summary here.

## First Section

Text with [internal](/blog/other) link about a rose.

## Second Section

### Detail

![A red rose](/img/rose.png)

See [source](https://example.com/ref).`;

describe('analyzeStructure', () => {
  it('reads title, headings, paragraphs, links and images', () => {
    expect(analyzeStructure(ARTICLE)).toEqual({
      has_title: true,
      title_length: 7,
      h2_count: 2,
      h3_count: 1,
      paragraph_count: 8,
      avg_paragraph_length: 33 / 8,
      has_meta_description: true,
      has_image_alt: true,
      has_internal_links: true,
      has_external_links: true,
    });
  });

  it('returns an empty structure for empty text', () => {
    expect(analyzeStructure('')).toEqual({
      has_title: false,
      title_length: 0,
      h2_count: 0,
      h3_count: 0,
      paragraph_count: 0,
      avg_paragraph_length: 0,
      has_meta_description: false,
      has_image_alt: false,
      has_internal_links: false,
      has_external_links: false,
    });
  });

  it('reads CRLF text the same as LF text', () => {
    const metrics = analyzeStructure(ARTICLE.replace(/\n/g, '\r\n'));

    expect(metrics.paragraph_count).toBe(8);
    expect(metrics).toEqual(analyzeStructure(ARTICLE));
  });

  it('skips an empty H1 line when looking for the title', () => {
    const metrics = analyzeStructure('#  \n# Real Title Here');

    expect(metrics.has_title).toBe(true);
    expect(metrics.title_length).toBe(15);
  });

  it('does not count H2 or H3 lines as the title', () => {
    const metrics = analyzeStructure('## Only a section\n\nBody text.');
    expect(metrics.has_title).toBe(false);
    expect(metrics.h2_count).toBe(1);
  });

  it('ignores images without alt text and does not treat images as links', () => {
    const metrics = analyzeStructure('Intro.\n\n![](/img/empty.png)\n\n![  ](https://example.com/a.png)');
    expect(metrics.has_image_alt).toBe(false);
    expect(metrics.has_internal_links).toBe(false);
    expect(metrics.has_external_links).toBe(false);
  });

  it('tells external links from internal ones by scheme', () => {
    expect(analyzeStructure('[a](https://example.com)').has_external_links).toBe(true);
    expect(analyzeStructure('[a](https://example.com)').has_internal_links).toBe(false);
    expect(analyzeStructure('[a](#section)').has_internal_links).toBe(true);
  });

  it('detects a meta description label anywhere in the text', () => {
    expect(analyzeStructure('Body\n\nDescription: summary').has_meta_description).toBe(true);
    expect(analyzeStructure('Body only').has_meta_description).toBe(false);
  });
});
