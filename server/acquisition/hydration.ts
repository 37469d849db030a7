import type { CheerioAPI } from 'cheerio';
import { z } from 'zod';

/**
 * Adapter for the page-hydration payload (`<script id="__NEXT_DATA__">`).
 *
 * The payload layout belongs to the publishing platform and changes without
 * notice. Everything that knows about its paths lives in this module; the
 * extractor only sees {@link HydratedPost}.
 */

export const HYDRATION_SCRIPT_SELECTOR = 'script#__NEXT_DATA__';
export const AUTHOR_PROFILE_BASE_URL = 'https://medium.com/@';

export interface HydratedAuthor {
  name?: string;
  username?: string;
}

export interface HydratedPost {
  title?: string;
  subtitle?: string;
  claps?: unknown;
  readingTime?: number;
  tags: string[];
  author?: HydratedAuthor;
  paragraphs: string[];
}

// Each leaf falls back to undefined on its own so one malformed field keeps the rest usable.
const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().finite().optional().catch(undefined);

const UserSchema = z
  .object({
    userId: optionalString,
    name: optionalString,
    username: optionalString,
  })
  .optional()
  .catch(undefined);

const TagsSchema = z
  .array(z.object({ name: z.string() }).optional().catch(undefined))
  .optional()
  .catch(undefined);

const ParagraphsSchema = z
  .array(z.object({ text: z.string().nullish().catch(undefined) }).optional().catch(undefined))
  .optional()
  .catch(undefined);

const PostSchema = z.object({
  title: optionalString,
  creatorId: optionalString,
  creator: UserSchema,
  virtuals: z
    .object({
      subtitle: optionalString,
      totalClapCount: z.unknown(),
      readingTime: optionalNumber,
      tags: TagsSchema,
    })
    .optional()
    .catch(undefined),
  content: z
    .object({
      bodyModel: z.object({ paragraphs: ParagraphsSchema }).optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
});

type RawPost = z.infer<typeof PostSchema>;

const PayloadSchema = z.object({
  props: z.object({
    pageProps: z.object({
      pageData: z
        .object({
          post: PostSchema.optional().catch(undefined),
          user: UserSchema,
        })
        .optional()
        .catch(undefined),
      post: PostSchema.optional().catch(undefined),
    }),
  }),
});

const resolveAuthor = (post: RawPost, user: z.infer<typeof UserSchema>): HydratedAuthor | undefined => {
  if (user && post.creatorId && user.userId === post.creatorId) {
    return { name: user.name, username: user.username };
  }
  if (post.creator) {
    return { name: post.creator.name, username: post.creator.username };
  }
  return undefined;
};

const toHydratedPost = (post: RawPost, user: z.infer<typeof UserSchema>): HydratedPost => ({
  title: post.title,
  subtitle: post.virtuals?.subtitle,
  claps: post.virtuals?.totalClapCount,
  readingTime: post.virtuals?.readingTime,
  tags: (post.virtuals?.tags ?? []).flatMap((tag) => (tag ? [tag.name] : [])),
  author: resolveAuthor(post, user),
  paragraphs: (post.content?.bodyModel?.paragraphs ?? []).map((paragraph) => paragraph?.text ?? ''),
});

// An empty post object on the primary path must not hide the alternate one.
const withFields = (post: RawPost | undefined): RawPost | undefined =>
  post && Object.values(post).some((value) => value !== undefined) ? post : undefined;

export const parseHydrationPayload = (raw: string): HydratedPost | null => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = PayloadSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }
  const { pageData, post: fallbackPost } = parsed.data.props.pageProps;
  const post = withFields(pageData?.post) ?? withFields(fallbackPost);
  return post ? toHydratedPost(post, pageData?.user) : null;
};

export const readHydratedPost = ($: CheerioAPI): HydratedPost | null => {
  const script = $(HYDRATION_SCRIPT_SELECTOR).first();
  if (!script.length) {
    return null;
  }
  return parseHydrationPayload(script.text());
};

export const authorProfileUrl = (username: string): string => `${AUTHOR_PROFILE_BASE_URL}${username}`;
