/**
 * The blog schema, declared with the definition helpers and converted with
 * `createSchema`. Records are exposed through views whose function-valued
 * properties graphql-js's default resolver calls lazily.
 */

import type { GraphQLSchema } from "graphql";
import {
  createSchema,
  DateScalar,
  defineArgument,
  defineEnum,
  defineField,
  defineInputType,
  defineObjectType,
  defineUnion,
  ref,
  valueDefault,
  type ConverterOptions,
  type TypeDefinition,
} from "../../../src";
import type {
  AuthorRecord,
  BlogData,
  CommentRecord,
  PostRecord,
  TagRecord,
} from "./mock-data";

// ─── Types ───────────────────────────────────────────────────────────

const PostStatus = defineEnum({
  name: "PostStatus",
  values: [
    { name: "DRAFT", value: "DRAFT", description: "Not published yet" },
    { name: "PUBLISHED", value: "PUBLISHED" },
  ],
});

const Tag = defineObjectType({
  name: "Tag",
  fields: [
    defineField({ name: "id", type: ref.scalar("ID") }),
    defineField({ name: "name", type: ref.scalar("String") }),
  ],
});

const Author: TypeDefinition = defineObjectType({
  name: "Author",
  fields: () => [
    defineField({ name: "id", type: ref.scalar("ID") }),
    defineField({ name: "name", type: ref.scalar("String") }),
    defineField({ name: "bio", type: ref.optional(ref.scalar("String")) }),
    defineField({ name: "posts", type: ref.list(ref.object(Post)) }),
  ],
});

const Comment: TypeDefinition = defineObjectType({
  name: "Comment",
  fields: () => [
    defineField({ name: "id", type: ref.scalar("ID") }),
    defineField({ name: "body", type: ref.scalar("String") }),
    defineField({ name: "createdAt", type: ref.scalar(DateScalar) }),
    defineField({ name: "author", type: ref.object(Author) }),
  ],
});

const Post: TypeDefinition = defineObjectType({
  name: "Post",
  fields: () => [
    defineField({ name: "id", type: ref.scalar("ID") }),
    defineField({ name: "title", type: ref.scalar("String") }),
    defineField({ name: "content", type: ref.scalar("String") }),
    defineField({ name: "publishedAt", type: ref.optional(ref.scalar(DateScalar)) }),
    defineField({ name: "status", type: ref.enum(PostStatus) }),
    defineField({ name: "author", type: ref.object(Author) }),
    defineField({ name: "comments", type: ref.list(ref.object(Comment)) }),
    defineField({ name: "tags", type: ref.list(ref.object(Tag)) }),
  ],
});

const SearchResult = defineUnion({
  name: "SearchResult",
  types: [ref.object(Post), ref.object(Author)],
});

const CreatePostInput = defineInputType({
  name: "CreatePostInput",
  fields: [
    defineField({ name: "title", type: ref.scalar("String") }),
    defineField({ name: "content", type: ref.scalar("String") }),
    defineField({ name: "authorId", type: ref.scalar("ID") }),
    defineField({ name: "tagIds", type: ref.optional(ref.list(ref.scalar("ID"))) }),
  ],
});

const AddCommentInput = defineInputType({
  name: "AddCommentInput",
  fields: [
    defineField({ name: "postId", type: ref.scalar("ID") }),
    defineField({ name: "body", type: ref.scalar("String") }),
    defineField({ name: "authorId", type: ref.scalar("ID") }),
  ],
});

// ─── Views ───────────────────────────────────────────────────────────

interface CreatePostArgs {
  input: { title: string; content: string; authorId: string; tagIds?: string[] | null };
}

interface AddCommentArgs {
  input: { postId: string; body: string; authorId: string };
}

function createViews(data: BlogData) {
  const findAuthor = (id: string): AuthorRecord => {
    const author = data.authors.find((a) => a.id === id);
    if (!author) throw new Error(`Unknown author "${id}".`);
    return author;
  };

  const postView = (p: PostRecord) => ({
    __typename: "Post",
    ...p,
    status: p.publishedAt ? "PUBLISHED" : "DRAFT",
    author: () => authorView(findAuthor(p.authorId)),
    comments: () => data.comments.filter((c) => c.postId === p.id).map(commentView),
    tags: () => data.tags.filter((t) => p.tagIds.includes(t.id)).map(tagView),
  });

  const authorView = (a: AuthorRecord) => ({
    __typename: "Author",
    ...a,
    posts: () => data.posts.filter((p) => p.authorId === a.id).map(postView),
  });

  const commentView = (c: CommentRecord) => ({
    ...c,
    author: () => authorView(findAuthor(c.authorId)),
  });

  const tagView = (t: TagRecord) => ({ ...t });

  return { findAuthor, postView, authorView, commentView };
}

// ─── Schema ──────────────────────────────────────────────────────────

export function createBlogSchema(
  data: BlogData,
  options: ConverterOptions = {},
): GraphQLSchema {
  const views = createViews(data);

  const Query = defineObjectType({
    name: "Query",
    fields: [
      defineField({
        name: "posts",
        type: ref.list(ref.object(Post)),
        arguments: [
          defineArgument({ name: "limit", type: ref.scalar("Int"), defaultValue: valueDefault(10) }),
          defineArgument({ name: "offset", type: ref.scalar("Int"), defaultValue: valueDefault(0) }),
        ],
        resolver: (_source, { limit, offset }: { limit: number; offset: number }) =>
          data.posts.slice(offset, offset + limit).map(views.postView),
      }),
      defineField({
        name: "post",
        type: ref.optional(ref.object(Post)),
        arguments: [defineArgument({ name: "id", type: ref.scalar("ID") })],
        resolver: (_source, { id }: { id: string }) => {
          const post = data.posts.find((p) => p.id === id);
          return post ? views.postView(post) : null;
        },
      }),
      defineField({
        name: "author",
        type: ref.optional(ref.object(Author)),
        arguments: [defineArgument({ name: "id", type: ref.scalar("ID") })],
        resolver: (_source, { id }: { id: string }) => {
          const author = data.authors.find((a) => a.id === id);
          return author ? views.authorView(author) : null;
        },
      }),
      defineField({
        name: "search",
        description: "Posts whose title and authors whose name contain the term",
        type: ref.list(ref.union(SearchResult)),
        arguments: [defineArgument({ name: "term", type: ref.scalar("String") })],
        resolver: (_source, { term }: { term: string }) => {
          const needle = term.toLowerCase();
          return [
            ...data.posts
              .filter((p) => p.title.toLowerCase().includes(needle))
              .map(views.postView),
            ...data.authors
              .filter((a) => a.name.toLowerCase().includes(needle))
              .map(views.authorView),
          ];
        },
      }),
    ],
  });

  const Mutation = defineObjectType({
    name: "Mutation",
    fields: [
      defineField({
        name: "createPost",
        type: ref.object(Post),
        arguments: [defineArgument({ name: "input", type: ref.input(CreatePostInput) })],
        resolver: (_source, { input }: CreatePostArgs) => {
          views.findAuthor(input.authorId);
          const post: PostRecord = {
            id: `p${data.posts.length + 1}`,
            title: input.title,
            content: input.content,
            publishedAt: null,
            authorId: input.authorId,
            tagIds: input.tagIds ?? [],
          };
          data.posts.push(post);
          return views.postView(post);
        },
      }),
      defineField({
        name: "addComment",
        type: ref.object(Comment),
        arguments: [defineArgument({ name: "input", type: ref.input(AddCommentInput) })],
        resolver: (_source, { input }: AddCommentArgs) => {
          const comment: CommentRecord = {
            id: `c${data.comments.length + 1}`,
            body: input.body,
            createdAt: new Date(),
            authorId: input.authorId,
            postId: input.postId,
          };
          data.comments.push(comment);
          return views.commentView(comment);
        },
      }),
    ],
  });

  return createSchema({ query: Query, mutation: Mutation }, options);
}
