/** In-memory data for the blog example */

export interface TagRecord {
  id: string;
  name: string;
}

export interface AuthorRecord {
  id: string;
  name: string;
  bio: string | null;
}

export interface CommentRecord {
  id: string;
  body: string;
  createdAt: Date;
  authorId: string;
  postId: string;
}

export interface PostRecord {
  id: string;
  title: string;
  content: string;
  publishedAt: Date | null;
  authorId: string;
  tagIds: string[];
}

export interface BlogData {
  tags: TagRecord[];
  authors: AuthorRecord[];
  posts: PostRecord[];
  comments: CommentRecord[];
}

/** A fresh copy of the sample data, so mutations never leak between stores. */
export function createBlogData(): BlogData {
  return {
    tags: [
      { id: "t1", name: "TypeScript" },
      { id: "t2", name: "GraphQL" },
      { id: "t3", name: "Node.js" },
    ],
    authors: [
      { id: "a1", name: "Alice", bio: "Full-stack developer" },
      { id: "a2", name: "Bob", bio: null },
    ],
    posts: [
      {
        id: "p1",
        title: "Getting Started with TypeScript",
        content: "TypeScript adds static typing to JavaScript...",
        publishedAt: new Date("2024-01-15T00:00:00.000Z"),
        authorId: "a1",
        tagIds: ["t1", "t3"],
      },
      {
        id: "p2",
        title: "GraphQL Best Practices",
        content: "When designing a GraphQL API...",
        publishedAt: new Date("2024-02-20T00:00:00.000Z"),
        authorId: "a1",
        tagIds: ["t2", "t3"],
      },
      {
        id: "p3",
        title: "Type-safe GraphQL Servers",
        content: "Deriving the schema from typed definitions...",
        publishedAt: null,
        authorId: "a2",
        tagIds: ["t1", "t2"],
      },
    ],
    comments: [
      {
        id: "c1",
        body: "Great introduction!",
        createdAt: new Date("2024-01-16T00:00:00.000Z"),
        authorId: "a2",
        postId: "p1",
      },
      {
        id: "c2",
        body: "Very helpful, thanks.",
        createdAt: new Date("2024-01-17T00:00:00.000Z"),
        authorId: "a1",
        postId: "p1",
      },
      {
        id: "c3",
        body: "Looking forward to the next part.",
        createdAt: new Date("2024-02-21T00:00:00.000Z"),
        authorId: "a2",
        postId: "p2",
      },
    ],
  };
}
