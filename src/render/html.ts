/**
 * HTML building blocks for the bundled render engine
 */

const KATEX_VERSION = '0.16.11';
const MERMAID_VERSION = '10.9.1';

/**
 * Escape text for use in element content and attribute values
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Page path of a module relative to the site root, always with forward slashes
 */
export function pageHref(fullname: string): string {
  return `${fullname.split('.').join('/')}.html`;
}

/**
 * Prefix leading from a module page back to the site root
 */
export function rootPrefix(fullname: string): string {
  return '../'.repeat(fullname.split('.').length - 1);
}

/**
 * Href from one module page to another
 */
export function linkBetween(from: string, to: string): string {
  return rootPrefix(from) + pageHref(to);
}

export interface PageOptions {
  title: string;
  /** Relative prefix to the site root, '' for top-level pages */
  root: string;
  body: string;
  math: boolean;
  mermaid: boolean;
  search: boolean;
}

export function renderPage(options: PageOptions): string {
  const head: string[] = [
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(options.title)}</title>`,
  ];

  if (options.math) {
    head.push(
      `<link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/katex@${KATEX_VERSION}/dist/katex.min.css">`,
      `<script defer src="https://cdn.jsdelivr.net/npm/katex@${KATEX_VERSION}/dist/katex.min.js"></script>`,
      `<script defer src="https://cdn.jsdelivr.net/npm/katex@${KATEX_VERSION}/dist/contrib/auto-render.min.js" onload="renderMathInElement(document.body)"></script>`
    );
  }

  if (options.mermaid) {
    head.push(
      `<script type="module">import mermaid from "https://cdn.jsdelivr.net/npm/mermaid@${MERMAID_VERSION}/dist/mermaid.esm.min.mjs"; mermaid.initialize({ startOnLoad: true });</script>`
    );
  }

  const nav: string[] = [`<a href="${options.root}index.html">Modules</a>`];
  if (options.search) {
    nav.push('<input type="search" id="search" placeholder="Search..." autocomplete="off">');
    nav.push('<ul id="search-results"></ul>');
    head.push(`<script defer src="${options.root}search.js"></script>`);
  }

  return [
    '<!doctype html>',
    '<html lang="en">',
    '<head>',
    ...head,
    '</head>',
    '<body>',
    `<nav>${nav.join('')}</nav>`,
    '<main>',
    options.body,
    '</main>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

/**
 * Client-side lookup over `window.modsiteSearchIndex`
 */
export const SEARCH_WIDGET_SCRIPT = `(function () {
  var data = window.modsiteSearchIndex;
  var input = document.getElementById("search");
  var list = document.getElementById("search-results");
  if (!data || !input || !list) return;
  var root = document.querySelector('script[src$="search.js"]').getAttribute("src").replace(/search\\.js$/, "");
  input.addEventListener("input", function () {
    var terms = input.value.toLowerCase().split(/[^a-z0-9_$]+/).filter(function (t) { return t.length > 1; });
    list.innerHTML = "";
    if (!terms.length) return;
    var hits = null;
    terms.forEach(function (term) {
      var found = {};
      Object.keys(data.index).forEach(function (token) {
        if (token.indexOf(term) === 0) data.index[token].forEach(function (i) { found[i] = true; });
      });
      hits = hits === null ? found : Object.keys(hits).reduce(function (acc, i) { if (found[i]) acc[i] = true; return acc; }, {});
    });
    Object.keys(hits || {}).slice(0, 50).forEach(function (i) {
      var doc = data.docs[i];
      var li = document.createElement("li");
      var a = document.createElement("a");
      a.href = root + doc.modulename.split(".").join("/") + ".html" + (doc.qualname === doc.modulename ? "" : "#" + doc.qualname);
      a.textContent = doc.qualname;
      li.appendChild(a);
      list.appendChild(li);
    });
  });
})();
`;
