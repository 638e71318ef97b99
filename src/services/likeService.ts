import { ConflictError, NotFoundError } from '../middleware/errorHandler';
import { Store } from '../models/store';

export type LikeService = ReturnType<typeof createLikeService>;

export function createLikeService(store: Store) {
  function likesOf(postId: number): Set<string> {
    if (!store.posts.has(postId)) throw new NotFoundError('Post not found');
    let likes = store.likes.get(postId);
    if (!likes) {
      likes = new Set();
      store.likes.set(postId, likes);
    }
    return likes;
  }

  return {
    like(postId: number, username: string): number {
      const likes = likesOf(postId);
      if (likes.has(username)) {
        throw new ConflictError('You have already liked this post');
      }
      likes.add(username);
      return likes.size;
    },

    unlike(postId: number, username: string): number {
      const likes = likesOf(postId);
      if (!likes.has(username)) {
        throw new ConflictError("You haven't liked this post");
      }
      likes.delete(username);
      return likes.size;
    },

    hasLiked(postId: number, username: string): boolean {
      return store.likes.get(postId)?.has(username) ?? false;
    },

    // Unknown ids count as zero.
    count(postId: number): number {
      return store.likes.get(postId)?.size ?? 0;
    },
  };
}
