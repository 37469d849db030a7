import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag, isText, type AnyNode } from 'domhandler';
import { NOT_AVAILABLE, type Article, type NotAvailable } from '../../shared/types';
import { coerceClaps } from '../search/corpus';
import { authorProfileUrl, readHydratedPost, type HydratedPost } from './hydration';
import { analyzeMedia } from './media';

export type ExtractionLayer = 'structured' | 'html';

export type Resolution<T> = { resolved: true; value: T; layer: ExtractionLayer } | { resolved: false };

export type FieldResolver<T> = () => Resolution<T>;

const UNRESOLVED: Resolution<never> = { resolved: false };

const BODY_PREVIEW_LENGTH = 500;
const SKIPPED_ELEMENTS = new Set(['script', 'style', 'noscript', 'template']);

const resolvedText = (value: string | null | undefined, layer: ExtractionLayer): Resolution<string> => {
  const trimmed = value?.trim();
  return trimmed ? { resolved: true, value: trimmed, layer } : UNRESOLVED;
};

/** Runs resolvers in order and keeps the first value one of them produces. */
export const resolveField = <T>(resolvers: ReadonlyArray<FieldResolver<T>>): Resolution<T> => {
  for (const resolver of resolvers) {
    const attempt = resolver();
    if (attempt.resolved) return attempt;
  }
  return UNRESOLVED;
};

const valueOr = <T, F>(resolution: Resolution<T>, fallback: F): T | F => (resolution.resolved ? resolution.value : fallback);

/** Text nodes below `root`, each trimmed, empty ones dropped, joined by single spaces. */
export const collectText = <T extends AnyNode>($: CheerioAPI, root: Cheerio<T>): string => {
  const parts: string[] = [];
  const walk = (nodes: Cheerio<AnyNode>) => {
    nodes.each((_, node) => {
      if (isText(node)) {
        const text = node.data.trim();
        if (text) parts.push(text);
      } else if (isTag(node) && !SKIPPED_ELEMENTS.has(node.name)) {
        walk($(node).contents());
      }
    });
  };
  walk(root.contents());
  return parts.join(' ');
};

const firstHeading = ($: CheerioAPI, selector: 'h1' | 'h2'): FieldResolver<string> => () =>
  resolvedText($(selector).first().text(), 'html');

const mainContentText = ($: CheerioAPI): FieldResolver<string> => () => {
  const main = $('div[role="main"]').first();
  const container = main.length ? main : $('article').first();
  return container.length ? resolvedText(collectText($, container), 'html') : UNRESOLVED;
};

const bodyPreview = ($: CheerioAPI): FieldResolver<string> => () => ({
  resolved: true,
  value: `${Array.from(collectText($, $('body'))).slice(0, BODY_PREVIEW_LENGTH).join('')}...`,
  layer: 'html',
});

const fromPost = (post: HydratedPost | null, pick: (post: HydratedPost) => string | undefined): FieldResolver<string> => () =>
  post ? resolvedText(pick(post), 'structured') : UNRESOLVED;

const resolveKeywords = (post: HydratedPost | null): string[] =>
  (post?.tags ?? []).map((tag) => tag.trim()).filter(Boolean);

const resolveReadingTime = (post: HydratedPost | null): number | NotAvailable => {
  const minutes = post?.readingTime;
  return minutes ? Math.trunc(minutes) : NOT_AVAILABLE;
};

const resolveAuthor = (post: HydratedPost | null): { authorName: string; authorUrl: string } => {
  const author = post?.author;
  const name = author?.name?.trim();
  const username = author?.username?.trim();
  return {
    authorName: name || NOT_AVAILABLE,
    authorUrl: username ? authorProfileUrl(username) : NOT_AVAILABLE,
  };
};

export const formatReadingTime = (minutes: number | NotAvailable): string =>
  minutes === NOT_AVAILABLE ? NOT_AVAILABLE : `${minutes} min`;

/**
 * Builds an Article from a fetched page. Hydration data wins where present;
 * headings and content containers fill whatever it left empty. Never throws.
 */
export const extractArticle = (html: string, url: string): Article => {
  const $ = cheerio.load(html);
  const post = readHydratedPost($);
  const media = analyzeMedia($, url);

  const title = resolveField([fromPost(post, (p) => p.title), firstHeading($, 'h1')]);
  const subtitle = resolveField([fromPost(post, (p) => p.subtitle), firstHeading($, 'h2')]);
  const text = resolveField([
    fromPost(post, (p) => p.paragraphs.join(' ')),
    mainContentText($),
    bodyPreview($),
  ]);

  return {
    url,
    title: valueOr(title, NOT_AVAILABLE),
    subtitle: valueOr(subtitle, NOT_AVAILABLE),
    text: valueOr(text, NOT_AVAILABLE),
    keywords: resolveKeywords(post),
    ...resolveAuthor(post),
    claps: coerceClaps(post?.claps),
    readingTimeMinutes: resolveReadingTime(post),
    imageCount: media.imageCount,
    imageUrls: media.imageUrls,
    externalLinkCount: media.externalLinkCount,
  };
};
