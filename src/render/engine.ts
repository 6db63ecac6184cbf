/**
 * Bundled HTML render engine
 * Deterministic output: the same modules always render to the same bytes
 */

import type { DocMember, DocModule, ModuleMap } from '../types/module.js';
import type { RenderEngine, RenderOptions, TemplateContext } from '../types/engine.js';
import type { SearchPayload } from '../types/search.js';
import {
  SEARCH_WIDGET_SCRIPT,
  escapeHtml,
  linkBetween,
  pageHref,
  renderPage,
  rootPrefix,
} from './html.js';

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  math: false,
  mermaid: false,
  search: true,
  docformat: 'markdown',
};

const KIND_ORDER: readonly DocMember['kind'][] = ['class', 'function', 'namespace', 'variable'];

export class HtmlRenderEngine implements RenderEngine {
  private current: RenderOptions;

  constructor(options: Partial<RenderOptions> = {}) {
    this.current = { ...DEFAULT_RENDER_OPTIONS, ...options };
  }

  get options(): Readonly<RenderOptions> {
    return { ...this.current };
  }

  configure(options: Partial<RenderOptions>): void {
    this.current = { ...this.current, ...options };
  }

  createTemplateContext(_allModules: ModuleMap): TemplateContext {
    return {
      isPublic: member => !member.name.startsWith('_'),
    };
  }

  renderModule(module: DocModule, allModules: ModuleMap): string {
    const context = this.createTemplateContext(allModules);
    const sections: string[] = [
      this.renderBreadcrumb(module, allModules),
      `<h1>${escapeHtml(module.fullname)}</h1>`,
    ];

    if (module.doc) {
      sections.push(`<p class="docstring">${escapeHtml(module.doc)}</p>`);
    }

    const children = [...allModules.keys()].filter(
      name => name.startsWith(`${module.fullname}.`) && !name.slice(module.fullname.length + 1).includes('.')
    );
    if (children.length > 0) {
      sections.push('<h2>Submodules</h2>', '<ul class="submodules">');
      for (const child of children) {
        sections.push(
          `<li><a href="${linkBetween(module.fullname, child)}">${escapeHtml(child)}</a></li>`
        );
      }
      sections.push('</ul>');
    }

    const members = module.members.filter(member => context.isPublic(member));
    for (const kind of KIND_ORDER) {
      const ofKind = members.filter(member => member.kind === kind);
      if (ofKind.length === 0) continue;

      sections.push(`<h2>${kindHeading(kind)}</h2>`, '<dl class="members">');
      for (const member of ofKind) {
        const signature = member.signature ? escapeHtml(member.signature) : '';
        sections.push(
          `<dt id="${escapeHtml(member.qualname)}"><code>${escapeHtml(member.name)}${signature}</code></dt>`
        );
        sections.push(`<dd>${member.doc ? escapeHtml(member.doc) : ''}</dd>`);
      }
      sections.push('</dl>');
    }

    return renderPage({
      title: module.fullname,
      root: rootPrefix(module.fullname),
      body: sections.join('\n'),
      math: this.current.math,
      mermaid: this.current.mermaid,
      search: this.current.search,
    });
  }

  renderIndex(allModules: ModuleMap): string {
    if (allModules.size === 0) {
      return '';
    }

    const items = [...allModules.keys()].map(
      name => `<li><a href="${pageHref(name)}">${escapeHtml(name)}</a></li>`
    );

    return renderPage({
      title: 'Module index',
      root: '',
      body: ['<h1>Modules</h1>', '<ul class="modules">', ...items, '</ul>'].join('\n'),
      math: false,
      mermaid: false,
      search: this.current.search,
    });
  }

  renderSearchScript(payload: SearchPayload): string {
    return `window.modsiteSearchIndex = ${JSON.stringify(payload)};\n${SEARCH_WIDGET_SCRIPT}`;
  }

  private renderBreadcrumb(module: DocModule, allModules: ModuleMap): string {
    const parts = module.fullname.split('.');
    const crumbs = parts.map((part, i) => {
      const name = parts.slice(0, i + 1).join('.');
      if (name === module.fullname || !allModules.has(name)) {
        return escapeHtml(part);
      }
      return `<a href="${linkBetween(module.fullname, name)}">${escapeHtml(part)}</a>`;
    });
    return `<div class="breadcrumb">${crumbs.join('.')}</div>`;
  }
}

function kindHeading(kind: DocMember['kind']): string {
  switch (kind) {
    case 'class':
      return 'Classes';
    case 'function':
      return 'Functions';
    case 'namespace':
      return 'Namespaces';
    case 'variable':
      return 'Variables';
  }
}
