import * as cheerio from 'cheerio';
import { Candidate } from '../../types';
import { writeFileAtomic } from '../../utils/fs';

export const PAGE_SIZES = [10, 25, 50, 100, 500, 1000] as const;
export const DEFAULT_PAGE_SIZE = 50;

const escapeHtml = (text: string): string =>
    text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');

/** JSON that is safe inside a <script> element. */
export const embedJson = (value: unknown): string =>
    JSON.stringify(value)
        .replace(/</g, '\\u003c')
        .replace(/\u2028/g, '\\u2028')
        .replace(/\u2029/g, '\\u2029');

/**
 * Self-contained listing page with search and pagination. The listing is
 * embedded so the page also works when opened from disk.
 */
export const renderHtmlReport = (domains: Candidate[], title = 'Found Websites'): string => {
    const options = PAGE_SIZES
        .map(size => `      <option value="${size}"${size === DEFAULT_PAGE_SIZE ? ' selected' : ''}>${size}</option>`)
        .join('\n');

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 20px; }
    #searchBar { position: fixed; top: 20px; right: 20px; width: 200px; }
    li { margin-bottom: 5px; }
    .pagination button { margin: 0 5px; }
  </style>
</head>
<body>
  <div id="searchBar">
    <input type="text" id="searchInput" placeholder="Search domains...">
  </div>
  <h1>${escapeHtml(title)} (${domains.length})</h1>
  <div class="settings">
    <label for="itemsPerPage">Links per page: </label>
    <select id="itemsPerPage">
${options}
    </select>
  </div>
  <ul id="domainList"></ul>
  <div class="pagination">
    <button id="prev">Prev</button>
    <span id="pageInfo"></span>
    <button id="next">Next</button>
  </div>
  <script id="domains" type="application/json">${embedJson(domains)}</script>
  <script>
    var domains = JSON.parse(document.getElementById('domains').textContent);
    var view = domains;
    var page = 1;
    var perPage = ${DEFAULT_PAGE_SIZE};

    function pageCount() { return Math.max(1, Math.ceil(view.length / perPage)); }

    function render() {
      var list = document.getElementById('domainList');
      list.innerHTML = '';
      var start = (page - 1) * perPage;
      for (var i = start; i < Math.min(start + perPage, view.length); i++) {
        var li = document.createElement('li');
        var a = document.createElement('a');
        a.href = view[i];
        a.target = '_blank';
        a.rel = 'noopener';
        a.textContent = '[' + (i + 1) + '] ' + view[i];
        li.appendChild(a);
        list.appendChild(li);
      }
      document.getElementById('pageInfo').textContent =
        'Page ' + page + ' of ' + pageCount() + (view === domains ? '' : ' (filtered)');
    }

    document.getElementById('searchInput').addEventListener('input', function (e) {
      var filter = e.target.value.toLowerCase();
      view = filter ? domains.filter(function (d) { return d.toLowerCase().indexOf(filter) > -1; }) : domains;
      page = 1;
      render();
    });
    document.getElementById('itemsPerPage').addEventListener('change', function (e) {
      perPage = parseInt(e.target.value, 10);
      page = 1;
      render();
    });
    document.getElementById('prev').addEventListener('click', function () {
      if (page > 1) { page--; render(); }
    });
    document.getElementById('next').addEventListener('click', function () {
      if (page < pageCount()) { page++; render(); }
    });
    render();
  </script>
</body>
</html>
`;
};

export const writeHtmlReport = (filePath: string, domains: Candidate[]): Promise<void> =>
    writeFileAtomic(filePath, renderHtmlReport(domains));

/**
 * Every distinct entry of an HTML listing, sorted: the `<a href>` links of
 * older static pages plus the listing embedded by `renderHtmlReport`.
 */
export const extractListedLinks = (html: string): Candidate[] => {
    const $ = cheerio.load(html);
    const links = new Set<Candidate>();
    $('a[href]').each((_, el) => {
        const href = $(el).attr('href')?.trim();
        if (href) links.add(href);
    });

    const embedded = $('script#domains').text().trim();
    if (embedded) {
        const parsed: unknown = JSON.parse(embedded);
        if (Array.isArray(parsed)) {
            for (const entry of parsed) {
                if (typeof entry === 'string' && entry.trim()) links.add(entry.trim());
            }
        }
    }
    return [...links].sort();
};
