import { describe, it, expect } from 'vitest';
import { ContentNormalizer } from './normalizer';
import { silentLogger } from '../logger';

describe('ContentNormalizer', () => {
  it('ignores human-readable dates and relative timestamps', async () => {
    const html1 = `
      <html>
        <body>
          <header>Sunday Feb 22, 2026</header>
          <main>
            <p>News content here.</p>
            <p>Last updated: 2 days ago</p>
          </main>
        </body>
      </html>
    `;
    const html2 = `
      <html>
        <body>
          <header>Monday Feb 23, 2026</header>
          <main>
            <p>News content here.</p>
            <p>Last updated: 3 days ago</p>
          </main>
        </body>
      </html>
    `;

    const n1 = await ContentNormalizer.normalizeContent(html1, silentLogger);
    const n2 = await ContentNormalizer.normalizeContent(html2, silentLogger);
    expect(n1).toBe(n2);
  });

  it('hashes pages that differ only in nonces and numeric dates identically', async () => {
    const html1 = `<html><body><script nonce="abc123">run()</script><p>Report generated on 02/22/2026</p></body></html>`;
    const html2 = `<html><body><script nonce="zz9">run()</script><p>Report generated on 2/23/2026</p></body></html>`;

    const h1 = await ContentNormalizer.calculateNormalizedHash(html1, silentLogger);
    const h2 = await ContentNormalizer.calculateNormalizedHash(html2, silentLogger);
    expect(h1).toBe(h2);
    expect(h1).toMatch(/^[0-9a-f]{64}$/);
  });

  it('tells different content apart', async () => {
    const h1 = await ContentNormalizer.calculateNormalizedHash('<p>First article</p>', silentLogger);
    const h2 = await ContentNormalizer.calculateNormalizedHash('<p>Second article</p>', silentLogger);
    expect(h1).not.toBe(h2);
  });

  it('hashes raw content with SHA-256', () => {
    expect(ContentNormalizer.calculateHash('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });
});
