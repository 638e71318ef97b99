import { AuthorizationError, NotFoundError } from '../middleware/errorHandler';
import { Store } from '../models/store';
import { Post, UpdatePostBody } from '../types';

export type PostService = ReturnType<typeof createPostService>;

export function createPostService(store: Store) {
  function get(id: number): Post {
    const post = store.posts.get(id);
    if (!post) throw new NotFoundError('Post not found');
    return post;
  }

  function requireOwner(id: number, requester: string, action: 'update' | 'delete'): Post {
    const post = get(id);
    if (post.author !== requester) {
      throw new AuthorizationError(`Not authorized to ${action} this post`);
    }
    return post;
  }

  return {
    get,

    create(title: string, content: string, author: string): Post {
      const now = new Date().toISOString();
      const post: Post = {
        id: store.postIds.next(),
        title,
        content,
        author,
        createdAt: now,
        updatedAt: now,
      };
      store.posts.set(post.id, post);
      store.likes.set(post.id, new Set());
      store.comments.set(post.id, []);
      return post;
    },

    /** Newest first; posts created in the same millisecond fall back to id. */
    listAll(): Post[] {
      return [...store.posts.values()].sort(
        (a, b) => b.createdAt.localeCompare(a.createdAt) || b.id - a.id
      );
    },

    update(id: number, patch: UpdatePostBody, requester: string): Post {
      const post = requireOwner(id, requester, 'update');
      const updated: Post = {
        ...post,
        title: patch.title ?? post.title,
        content: patch.content ?? post.content,
        updatedAt: new Date().toISOString(),
      };
      store.posts.set(id, updated);
      return updated;
    },

    delete(id: number, requester: string): void {
      requireOwner(id, requester, 'delete');
      store.likes.delete(id);
      store.comments.delete(id);
      store.posts.delete(id);
    },
  };
}
