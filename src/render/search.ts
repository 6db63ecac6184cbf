/**
 * Bundled search engine
 * Flattens modules into search records and precompiles a token index over them
 */

import type { DocFormat } from '../config/schema.js';
import type { DocModule, ModuleMap } from '../types/module.js';
import type { SearchEngine, VisibilityPredicate } from '../types/engine.js';
import type { SearchIndexEntry, SearchPayload } from '../types/search.js';
import { collapseWhitespace, stripMarkdown, tokenize, truncate } from './text.js';

export const SEARCH_INDEX_VERSION = 1;

export const SEARCH_FIELDS = ['fullname', 'modulename', 'qualname', 'kind', 'signature', 'doc'];

/**
 * Fields whose text feeds the token index
 */
const INDEXED_FIELDS = ['qualname', 'doc'];

export class TermSearchEngine implements SearchEngine {
  extractEntries(
    modules: ModuleMap,
    isPublic: VisibilityPredicate,
    docformat: DocFormat
  ): SearchIndexEntry[] {
    const entries: SearchIndexEntry[] = [];

    for (const [name, module] of modules) {
      entries.push({
        fullname: name,
        modulename: name,
        qualname: name,
        kind: 'module',
        signature: '',
        doc: formatDoc(module.doc, docformat),
      });

      for (const member of publicMembers(module, isPublic)) {
        entries.push({
          fullname: `${name}.${member.name}`,
          modulename: name,
          qualname: member.qualname,
          kind: member.kind,
          signature: member.signature ?? '',
          doc: formatDoc(member.doc, docformat),
        });
      }
    }

    return entries;
  }

  precompile(entries: SearchIndexEntry[]): SearchPayload {
    const postings = new Map<string, Set<number>>();

    entries.forEach((entry, position) => {
      for (const field of INDEXED_FIELDS) {
        const value = entry[field];
        if (typeof value !== 'string') continue;

        for (const token of tokenize(value)) {
          let docs = postings.get(token);
          if (!docs) {
            docs = new Set();
            postings.set(token, docs);
          }
          docs.add(position);
        }
      }
    });

    // fromEntries defines own keys, so tokens such as `__proto__` survive
    const index: Record<string, number[]> = Object.fromEntries(
      [...postings.keys()]
        .sort()
        .map((token): [string, number[]] => [token, [...(postings.get(token) ?? [])].sort((a, b) => a - b)])
    );

    return {
      version: SEARCH_INDEX_VERSION,
      fields: [...SEARCH_FIELDS],
      docs: entries,
      index,
    };
  }
}

function publicMembers(module: DocModule, isPublic: VisibilityPredicate): DocModule['members'] {
  return module.members.filter(member => isPublic(member));
}

function formatDoc(doc: string | undefined, docformat: DocFormat): string {
  if (!doc) {
    return '';
  }
  const text = docformat === 'markdown' ? stripMarkdown(doc) : collapseWhitespace(doc);
  return truncate(text);
}
