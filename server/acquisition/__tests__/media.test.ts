import { describe, expect, it } from 'vitest';
import { isContentImage, isExternalLink } from '../media';

describe('isContentImage', () => {
  it('keeps full-size images served from the content CDNs', () => {
    expect(isContentImage('https://miro.medium.com/v2/resize:fit:700/1*abc.png')).toBe(true);
    expect(isContentImage('https://cdn-images-1.medium.com/max/800/1*abc.jpeg')).toBe(true);
  });

  it('drops thumbnails, other hosts and relative sources', () => {
    expect(isContentImage('https://cdn-images-1.medium.com/fit/c/40/40/abc.png?w=40')).toBe(false);
    expect(isContentImage('https://static.example.com/logo.png')).toBe(false);
    expect(isContentImage('/images/local.png')).toBe(false);
    expect(isContentImage('/images/local.png', 'https://medium.com/@writer/post')).toBe(false);
  });

  it('resolves protocol-relative sources against the article URL', () => {
    expect(isContentImage('//miro.medium.com/v2/resize:fit:1400/p.png', 'https://medium.com/@writer/post')).toBe(true);
  });
});

describe('isExternalLink', () => {
  const articleUrl = 'https://engineering.example.com/posts/first';

  it('counts links to unrelated hosts', () => {
    expect(isExternalLink('https://github.com/example/repo', articleUrl)).toBe(true);
  });

  it('ignores the article host and the platform domains', () => {
    expect(isExternalLink('https://engineering.example.com/other-post', articleUrl)).toBe(false);
    expect(isExternalLink('https://medium.com/tag/rust', articleUrl)).toBe(false);
    expect(isExternalLink('https://policy.medium.com/terms', articleUrl)).toBe(false);
    expect(isExternalLink('https://towardsdatascience.com/some-post', articleUrl)).toBe(false);
  });

  it('counts protocol-relative links to unrelated hosts', () => {
    expect(isExternalLink('//github.com/example/repo', articleUrl)).toBe(true);
    expect(isExternalLink('//medium.com/tag/rust', articleUrl)).toBe(false);
  });

  it('ignores links without a host of their own', () => {
    expect(isExternalLink('/relative', articleUrl)).toBe(false);
    expect(isExternalLink('mailto:someone@example.com', articleUrl)).toBe(false);
    expect(isExternalLink('#section', articleUrl)).toBe(false);
  });
});
