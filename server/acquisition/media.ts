import type { CheerioAPI } from 'cheerio';

export const CONTENT_CDN_HOSTS = new Set(['cdn-images-1.medium.com', 'miro.medium.com']);
export const THUMBNAIL_MARKERS = ['w=40'];
/** Hosts (and their subdomains) that belong to the same publishing platform as the article. */
export const SAME_PLATFORM_DOMAINS = ['medium.com', 'towardsdatascience.com'];

export interface MediaSummary {
  imageUrls: string[];
  imageCount: number;
  externalLinkCount: number;
}

/** Host of `value`, resolved against `base` so protocol-relative and relative URLs get one too. */
const hostOf = (value: string, base?: string): string | null => {
  try {
    return new URL(value, base).hostname.toLowerCase() || null;
  } catch {
    return null;
  }
};

const isWithinDomain = (host: string, domain: string): boolean => host === domain || host.endsWith(`.${domain}`);

export const isContentImage = (src: string, baseUrl?: string): boolean => {
  const host = hostOf(src, baseUrl);
  if (!host || !CONTENT_CDN_HOSTS.has(host)) return false;
  return !THUMBNAIL_MARKERS.some((marker) => src.includes(marker));
};

export const isExternalLink = (href: string, articleUrl: string): boolean => {
  const host = hostOf(href, articleUrl);
  if (!host) return false;
  const articleHost = hostOf(articleUrl);
  if (articleHost && host === articleHost) return false;
  return !SAME_PLATFORM_DOMAINS.some((domain) => isWithinDomain(host, domain));
};

export const analyzeMedia = ($: CheerioAPI, articleUrl: string): MediaSummary => {
  const imageUrls: string[] = [];
  $('img[src]').each((_, el) => {
    const src = $(el).attr('src')?.trim();
    if (src && isContentImage(src, articleUrl)) {
      imageUrls.push(src);
    }
  });

  let externalLinkCount = 0;
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')?.trim();
    if (href && isExternalLink(href, articleUrl)) {
      externalLinkCount += 1;
    }
  });

  return {
    imageUrls,
    imageCount: imageUrls.length,
    externalLinkCount,
  };
};
