import { CheerioDocument, type DocumentQuery } from './document-query';
import type { ProfileStats, RepositorySummary } from './types';

const SUFFIXES: Record<string, number> = { k: 1_000, m: 1_000_000 };

/** Reads counters as GitHub prints them: `1,234`, `1.2k`, `3m`. */
export function parseCount(text: string): number | undefined {
  const match = /(\d[\d,]*(?:\.\d+)?)([km])?\b/i.exec(text);
  if (!match) return undefined;

  const value = parseFloat(match[1].replace(/,/g, ''));
  const multiplier = match[2] ? SUFFIXES[match[2].toLowerCase()] : 1;
  return Math.round(value * multiplier);
}

function linkCounter<TNode>(doc: DocumentQuery<TNode>, tab: string): number | undefined {
  const link = doc
    .findAll('a')
    .find((node) => doc.attribute(node, 'href')?.endsWith(`?tab=${tab}`));
  if (!link) return undefined;

  const [counter] = doc.findAll('span', { class: 'text-bold' }, link);
  return counter ? parseCount(doc.text(counter)) : undefined;
}

export function extractProfileStats<TNode>(doc: DocumentQuery<TNode>): ProfileStats {
  const stats: ProfileStats = {};

  for (const box of doc.findAll('div', { class: 'js-yearly-contributions' })) {
    const heading = doc
      .findAll('h2', {}, box)
      .find((node) => doc.text(node).toLowerCase().includes('contributions'));
    const total = heading ? parseCount(doc.text(heading)) : undefined;
    if (total !== undefined) {
      stats.totalContributionsLastYear = total;
      break;
    }
  }

  const [counter] = doc.findAll('span', { class: 'Counter' });
  const repositories = counter ? parseCount(doc.text(counter)) : undefined;
  if (repositories !== undefined) stats.repositories = repositories;

  const followers = linkCounter(doc, 'followers');
  if (followers !== undefined) stats.followers = followers;

  const following = linkCounter(doc, 'following');
  if (following !== undefined) stats.following = following;

  return stats;
}

export function extractRepositories<TNode>(doc: DocumentQuery<TNode>): RepositorySummary[] {
  const repositories: RepositorySummary[] = [];

  for (const item of doc.findAll('li', { class: 'public source' })) {
    const [nameTag] = doc.findAll('a', { itemprop: 'name codeRepository' }, item);
    if (!nameTag) continue;

    const [description] = doc.findAll('p', { itemprop: 'description' }, item);
    const [language] = doc.findAll('span', { itemprop: 'programmingLanguage' }, item);

    repositories.push({
      name: doc.text(nameTag).trim(),
      description: description ? doc.text(description).trim() : '',
      language: language ? doc.text(language).trim() : '',
    });
  }

  return repositories;
}

export function parseProfileStats(markup: string): ProfileStats {
  return extractProfileStats(new CheerioDocument(markup));
}

export function parseRepositories(markup: string): RepositorySummary[] {
  return extractRepositories(new CheerioDocument(markup));
}
