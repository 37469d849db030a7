export interface CorpusInput {
  url: string;
  title?: string | null;
  subtitle?: string | null;
  text?: string | null;
  keywords?: string | readonly string[] | null;
  claps?: unknown;
}

export interface CorpusEntry {
  /** Position in the corpus and row of the weight matrix. */
  row: number;
  url: string;
  title: string;
  claps: number;
  searchText: string;
}

export type Corpus = ReadonlyArray<Readonly<CorpusEntry>>;

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** A count as a non-negative integer; anything unreadable counts as zero. */
export const coerceCount = (value: unknown): number => {
  let numeric: number;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && NUMERIC_PATTERN.test(value.trim())) {
    numeric = Number(value.trim());
  } else {
    return 0;
  }
  if (!Number.isFinite(numeric)) return 0;
  return Math.max(0, Math.trunc(numeric));
};

export const coerceClaps = coerceCount;

const keywordText = (keywords: CorpusInput['keywords']): string => {
  if (keywords == null) return '';
  return typeof keywords === 'string' ? keywords : keywords.join(', ');
};

export const buildSearchText = (input: CorpusInput): string =>
  [input.title ?? '', input.subtitle ?? '', input.text ?? '', keywordText(input.keywords)].join(' ');

export const buildCorpus = (articles: readonly CorpusInput[]): Corpus =>
  articles.map((article, row) =>
    Object.freeze({
      row,
      url: article.url,
      title: article.title ?? '',
      claps: coerceClaps(article.claps),
      searchText: buildSearchText(article),
    }),
  );
