/**
 * html-table-renderer.test.ts
 *
 * Covers table markup: header row, cell escaping, null cells, header-less
 * single-column tables.
 */

import { HtmlTableRenderer, TABLE_CLASSES, escapeHtml, singleColumn } from '../html-table-renderer.js';

const renderer = new HtmlTableRenderer();

describe('HtmlTableRenderer', () => {
  it('renders header and body rows', () => {
    const html = renderer.render({
      className: TABLE_CLASSES.results,
      header: ['Choice', 'N'],
      rows: [['Yes', 12], ['No', null]],
    });
    expect(html).toBe(
      [
        '<table class="data table table-bordered table-condensed">',
        '<tr><th>Choice</th><th>N</th></tr>',
        '<tr><td>Yes</td><td>12</td></tr>',
        '<tr><td>No</td><td></td></tr>',
        '</table>',
      ].join('\n'),
    );
  });

  it('escapes markup characters in headers and cells', () => {
    const html = renderer.render({
      className: 'x',
      header: ['<b>'],
      rows: [['Tom & Jerry said "hi" <3']],
    });
    expect(html).toBe(
      [
        '<table class="x">',
        '<tr><th>&lt;b&gt;</th></tr>',
        '<tr><td>Tom &amp; Jerry said "hi" &lt;3</td></tr>',
        '</table>',
      ].join('\n'),
    );
  });

  it('omits the header row for single-column tables', () => {
    const html = renderer.render(singleColumn('survey_logic', ['Q1', 'Text']));
    expect(html).toBe('<table class="survey_logic">\n<tr><td>Q1</td></tr>\n<tr><td>Text</td></tr>\n</table>');
  });
});

describe('escapeHtml', () => {
  it('escapes ampersands before angle brackets', () => {
    expect(escapeHtml('&lt;')).toBe('&amp;lt;');
  });
});
