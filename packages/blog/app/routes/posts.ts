import * as z from 'zod/v4';
import { listPosts, PostSchema } from '../data/posts';

export const PostsResponseSchema = z.array(PostSchema);

export function getPosts() {
  return listPosts();
}
