import * as z from 'zod/v4';

export const PostSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  content: z.string(),
  author: z.string(),
});

export type Post = z.infer<typeof PostSchema>;

export const PostListSchema = z
  .array(PostSchema)
  .refine((posts) => new Set(posts.map((post) => post.id)).size === posts.length, {
    message: 'Post ids must be unique',
  });

// Sample posts data, fixed for the lifetime of the process
const POSTS: ReadonlyArray<Readonly<Post>> = Object.freeze(
  PostListSchema.parse([
    {
      id: 1,
      title: 'First Post',
      content: 'This is the first blog post',
      author: 'John Doe',
    },
    {
      id: 2,
      title: 'Learning FastAPI',
      content: 'FastAPI is a modern Python web framework',
      author: 'Jane Smith',
    },
    {
      id: 3,
      title: 'Python Tips',
      content: 'Some useful Python programming tips',
      author: 'Mike Johnson',
    },
    {
      id: 4,
      title: 'Web Development',
      content: 'Building scalable web applications',
      author: 'Sarah Williams',
    },
    {
      id: 5,
      title: 'API Design Best Practices',
      content: 'How to design clean and effective APIs',
      author: 'Tom Brown',
    },
  ]).map((post) => Object.freeze(post))
);

/**
 * All posts, in insertion order
 */
export function listPosts(): ReadonlyArray<Readonly<Post>> {
  return POSTS;
}
