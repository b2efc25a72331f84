import type { Inkpress as IP } from '@inkpress/framework';
import { listPosts } from '../data/posts';

export const HOME_TITLE = 'Blog Home';

/**
 * Home page rendered from the home.html template.
 * Template errors are left to the framework's error response.
 */
export function getHome(context: IP.Context) {
  return context.res.render('home.html', {
    request: context.req,
    posts: listPosts(),
    title: HOME_TITLE,
  });
}
