import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { Article, SnapshotRecord } from '../../shared/types';
import { formatReadingTime } from '../acquisition/extractor';
import { coerceClaps, coerceCount } from '../search/corpus';

export const SNAPSHOT_COLUMNS = [
  'URL',
  'Title',
  'Subtitle',
  'Text',
  'No. of images',
  'Image URLs',
  'No. of external links',
  'Author Name',
  'Author URL',
  'Claps',
  'Reading Time',
  'Keywords',
] as const;

type SnapshotColumn = (typeof SNAPSHOT_COLUMNS)[number];
type SnapshotRow = Record<SnapshotColumn, string | number>;

export const LIST_SEPARATOR = ', ';

const toRow = (article: Article): SnapshotRow => ({
  URL: article.url,
  Title: article.title,
  Subtitle: article.subtitle,
  Text: article.text,
  'No. of images': article.imageCount,
  'Image URLs': article.imageUrls.join(LIST_SEPARATOR),
  'No. of external links': article.externalLinkCount,
  'Author Name': article.authorName,
  'Author URL': article.authorUrl,
  Claps: article.claps,
  'Reading Time': formatReadingTime(article.readingTimeMinutes),
  Keywords: article.keywords.join(LIST_SEPARATOR),
});

export const serializeSnapshot = (articles: readonly Article[]): string =>
  stringify(articles.map(toRow), {
    header: true,
    columns: [...SNAPSHOT_COLUMNS],
  });

const cell = (row: Record<string, string | undefined>, column: SnapshotColumn): string => row[column] ?? '';

const toRecord = (row: Record<string, string | undefined>): SnapshotRecord => ({
  url: cell(row, 'URL'),
  title: cell(row, 'Title'),
  subtitle: cell(row, 'Subtitle'),
  text: cell(row, 'Text'),
  keywords: cell(row, 'Keywords'),
  authorName: cell(row, 'Author Name'),
  authorUrl: cell(row, 'Author URL'),
  claps: coerceClaps(cell(row, 'Claps')),
  readingTime: cell(row, 'Reading Time'),
  imageCount: coerceCount(cell(row, 'No. of images')),
  imageUrls: cell(row, 'Image URLs'),
  externalLinkCount: coerceCount(cell(row, 'No. of external links')),
});

export const parseSnapshot = (content: string): SnapshotRecord[] => {
  const rows: Record<string, string | undefined>[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true,
  });
  return rows.map(toRecord);
};

/** Writes the whole snapshot at once, replacing any previous file. */
export const writeSnapshot = async (filePath: string, articles: readonly Article[]): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeSnapshot(articles), 'utf-8');
};

export const readSnapshot = async (filePath: string): Promise<SnapshotRecord[]> =>
  parseSnapshot(await fs.readFile(filePath, 'utf-8'));
