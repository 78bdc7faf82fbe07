import { describe, expect, it } from 'vitest';
import { SnapshotPage } from '../../src/browser/snapshotPage.js';
import { DETAIL_URL, loadDetailFixture } from '../helpers/pages.js';

describe('SnapshotPage', () => {
  it('renders one line per block with whitespace collapsed', async () => {
    const page = new SnapshotPage('<body><div><p>First  line</p>Loose <b>text</b><br>after break</div></body>', DETAIL_URL);
    expect(await page.bodyText()).toBe('First line\nLoose text\nafter break');
  });

  it('leaves scripts and styles out of the text', async () => {
    const page = await loadDetailFixture();
    const body = await page.bodyText();
    expect(body.split('\n').slice(0, 3)).toEqual([
      'Back to jobs',
      'Senior Planner',
      'Join our Development Services team to shape the growth of the city.',
    ]);
    expect(body).not.toContain('analytics');
    expect(body.split('\n').at(-1)).toBe('About us');
  });

  it('returns texts for every match of a selector', async () => {
    const page = await loadDetailFixture();
    expect(await page.textsOf('h3')).toEqual(['Key Responsibilities', 'Key Selection Criteria', 'What we offer']);
  });

  it('finds the innermost element matching a pattern', async () => {
    const page = await loadDetailFixture();
    expect(await page.firstTextMatching(/key selection criteria/i)).toBe('Key Selection Criteria');
    expect(await page.firstTextMatching(/no such text/)).toBeNull();
  });

  it('reads list items under matching headings', async () => {
    const page = await loadDetailFixture();
    expect(await page.listItemsUnderHeadings('h3', ['responsibilities'])).toEqual([
      'Assess planning permit applications',
      'Provide advice to developers',
    ]);
  });

  it('reads raw hrefs and reports nothing clickable', async () => {
    const page = await loadDetailFixture();
    expect(await page.hrefsOf("a[href*='.pdf']")).toEqual([
      '/docs/position-description.pdf',
      'https://cdn.example.org/files/benefits.pdf?v=2',
    ]);
    expect(await page.clickAll('button', /read more/i)).toBe(0);
    expect(page.url()).toBe(DETAIL_URL);
  });
});
