import { StatusRow } from '../reconcile/reconciler';
import { DomainScans, ScanDetail, SourcedUrl } from './collector';

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** `2026-01-02_03-04-05` as `2026-01-02 03:04:05 UTC`. */
export function formatScanTime(timestamp: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})_(\d{2})-(\d{2})-(\d{2})$/.exec(timestamp);
  return match ? `${match[1]} ${match[2]}:${match[3]}:${match[4]} UTC` : timestamp;
}

const STYLE = `
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #f5f5f5; color: #333; }
    .container { max-width: 1200px; margin: 0 auto; padding: 20px; }
    h1 { font-size: 24px; margin-bottom: 16px; }
    h2 { font-size: 18px; margin: 24px 0 12px; }
    a { color: #2563eb; text-decoration: none; }
    a:hover { text-decoration: underline; }
    .nav { margin-bottom: 16px; font-size: 14px; }
    .card { background: white; border: 1px solid #e5e5e5; border-radius: 8px; padding: 16px; margin-bottom: 16px; }
    .muted { color: #6b7280; font-size: 13px; }
    table { width: 100%; border-collapse: collapse; background: white; font-size: 14px; }
    th, td { text-align: left; padding: 8px 10px; border-bottom: 1px solid #eee; word-break: break-all; }
    th { background: #fafafa; font-weight: 600; }
    .status-New { color: #b91c1c; font-weight: 600; }
    .status-Existing { color: #6b7280; }
    .status-Fixed { color: #15803d; font-weight: 600; }
    .empty { color: #6b7280; font-style: italic; padding: 8px 0; }
    .search-box { width: 100%; padding: 8px 10px; margin-bottom: 8px; border: 1px solid #d1d5db; border-radius: 6px; font-size: 14px; }
    .pagination { margin: 8px 0 16px; font-size: 14px; }
    .pagination button { padding: 4px 10px; border: 1px solid #d1d5db; background: white; border-radius: 4px; cursor: pointer; }
    .pagination button:disabled { opacity: 0.5; cursor: default; }
    .pagination span { margin: 0 10px; }
`;

export const ROWS_PER_PAGE = 25;

// Filters each searchable table by the text of its rows and shows one page at a time
const PAGED_TABLE_SCRIPT = `
    function pagedTable(id, rowsPerPage) {
      var table = document.getElementById(id);
      var search = document.getElementById(id + '-search');
      var pager = document.getElementById(id + '-pages');
      if (!table || !pager) return;
      var rows = Array.prototype.slice.call(table.tBodies[0].rows);
      var matching = rows;
      var page = 1;

      function render() {
        var pages = Math.max(1, Math.ceil(matching.length / rowsPerPage));
        page = Math.min(page, pages);
        rows.forEach(function (row) { row.style.display = 'none'; });
        matching.slice((page - 1) * rowsPerPage, page * rowsPerPage).forEach(function (row) { row.style.display = ''; });

        pager.innerHTML = '';
        var prev = document.createElement('button');
        prev.textContent = 'Previous';
        prev.disabled = page === 1;
        prev.onclick = function () { page--; render(); };
        var info = document.createElement('span');
        info.textContent = 'Page ' + page + ' of ' + pages + ' (' + matching.length + ' URLs)';
        var next = document.createElement('button');
        next.textContent = 'Next';
        next.disabled = page === pages;
        next.onclick = function () { page++; render(); };
        pager.appendChild(prev);
        pager.appendChild(info);
        pager.appendChild(next);
      }

      if (search) {
        search.addEventListener('input', function () {
          var term = search.value.toLowerCase();
          matching = rows.filter(function (row) { return row.textContent.toLowerCase().indexOf(term) !== -1; });
          page = 1;
          render();
        });
      }
      render();
    }
    document.querySelectorAll('table[data-paged]').forEach(function (table) {
      pagedTable(table.id, Number(table.getAttribute('data-paged')));
    });
`;

export class ReportTemplates {
  static page(title: string, body: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${STYLE}</style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>
`;
  }

  static mainIndex(domains: DomainScans[]): string {
    const items = domains.map(({ domain, scans }) => {
      const latest = scans[scans.length - 1];
      const latestText = latest ? formatScanTime(latest.timestamp) : 'No scans';
      return `      <li><a href="${encodeURIComponent(domain)}/index.html">${escapeHtml(domain)}</a> ` +
        `<span class="muted">(Latest scan: ${escapeHtml(latestText)})</span></li>`;
    });

    const body = `    <h1>Sitemap Comparison Reports</h1>
    <div class="card">
${domains.length > 0 ? `    <ul>\n${items.join('\n')}\n    </ul>` : '    <p class="empty">No scans found.</p>'}
    </div>`;

    return this.page('Sitemap Comparison Reports', body);
  }

  static domainIndex(domain: string, scans: ScanDetail[]): string {
    const rows = scans
      .slice()
      .reverse()
      .map(scan => {
        const counts = scan.comparison
          ? `${this.count(scan.comparison.missingFromSite, 'New')} / ${this.count(scan.comparison.missingFromSite, 'Fixed')}`
          : '-';
        const sitemapCounts = scan.comparison
          ? `${this.count(scan.comparison.missingFromSitemap, 'New')} / ${this.count(scan.comparison.missingFromSitemap, 'Fixed')}`
          : '-';
        return `        <tr><td><a href="${encodeURIComponent(scan.timestamp)}.html">${escapeHtml(formatScanTime(scan.timestamp))}</a></td>` +
          `<td>${scan.missingFromSite.length}</td><td>${scan.missingFromSitemap.length}</td>` +
          `<td>${counts}</td><td>${sitemapCounts}</td></tr>`;
      });

    const body = `    <div class="nav"><a href="../index.html">&larr; All domains</a></div>
    <h1>Sitemap Comparison for ${escapeHtml(domain)}</h1>
    <h2>Scans</h2>
    <table>
      <thead>
        <tr><th>Scan</th><th>Missing from site</th><th>Missing from sitemap</th><th>Site new / fixed</th><th>Sitemap new / fixed</th></tr>
      </thead>
      <tbody>
${rows.join('\n')}
      </tbody>
    </table>`;

    return this.page(`Sitemap Comparison - ${domain}`, body);
  }

  static scanPage(domain: string, scan: ScanDetail): string {
    const sections = [
      this.sourcedSection('missing-from-site', 'URLs in the sitemap but not found by the crawl', 'Sitemap', scan.missingFromSite),
      this.sourcedSection('missing-from-sitemap', 'URLs found by the crawl but not in the sitemap', 'Found on', scan.missingFromSitemap)
    ];

    if (scan.comparison) {
      sections.push(
        this.statusSection(
          'changes-missing-from-site',
          'Missing from site compared with the previous scan',
          scan.comparison.missingFromSite
        ),
        this.statusSection(
          'changes-missing-from-sitemap',
          'Missing from sitemap compared with the previous scan',
          scan.comparison.missingFromSitemap
        )
      );
    }

    const body = `    <div class="nav"><a href="index.html">&larr; ${escapeHtml(domain)}</a></div>
    <h1>${escapeHtml(domain)}: ${escapeHtml(formatScanTime(scan.timestamp))}</h1>
${sections.join('\n')}
    <script>${PAGED_TABLE_SCRIPT}    </script>`;

    return this.page(`${domain} - ${formatScanTime(scan.timestamp)}`, body);
  }

  private static sourcedSection(id: string, title: string, sourceLabel: string, rows: SourcedUrl[]): string {
    const heading = `    <h2>${escapeHtml(title)} (${rows.length})</h2>`;
    if (rows.length === 0) {
      return `${heading}\n    <p class="empty">None.</p>`;
    }

    const body = rows
      .map(row => `        <tr><td>${this.link(row.url)}</td><td>${row.source ? this.link(row.source) : ''}</td></tr>`)
      .join('\n');
    return `${heading}
${this.searchBox(id)}
    <table id="${id}" data-paged="${ROWS_PER_PAGE}">
      <thead><tr><th>URL</th><th>${escapeHtml(sourceLabel)}</th></tr></thead>
      <tbody>
${body}
      </tbody>
    </table>
    <div class="pagination" id="${id}-pages"></div>`;
  }

  private static statusSection(id: string, title: string, rows: StatusRow[]): string {
    const changed = rows.filter(row => row.status !== 'Existing');
    const heading = `    <h2>${escapeHtml(title)}</h2>`;
    if (changed.length === 0) {
      return `${heading}\n    <p class="empty">No changes.</p>`;
    }

    const body = changed
      .map(row => `        <tr><td class="status-${row.status}">${row.status}</td><td>${this.link(row.url)}</td></tr>`)
      .join('\n');
    return `${heading}
${this.searchBox(id)}
    <table id="${id}" data-paged="${ROWS_PER_PAGE}">
      <thead><tr><th>Status</th><th>URL</th></tr></thead>
      <tbody>
${body}
      </tbody>
    </table>
    <div class="pagination" id="${id}-pages"></div>`;
  }

  private static searchBox(id: string): string {
    return `    <input type="search" class="search-box" id="${id}-search" placeholder="Search URLs...">`;
  }

  private static link(url: string): string {
    const safe = escapeHtml(url);
    return /^https?:\/\//i.test(url) ? `<a href="${safe}" target="_blank" rel="noopener">${safe}</a>` : safe;
  }

  private static count(rows: StatusRow[], status: StatusRow['status']): number {
    return rows.filter(row => row.status === status).length;
  }
}
