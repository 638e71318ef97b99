import { NotFoundError } from '../middleware/errorHandler';
import { Store } from '../models/store';
import { Comment } from '../types';

export type CommentService = ReturnType<typeof createCommentService>;

export function createCommentService(store: Store) {
  function commentsOf(postId: number): Comment[] {
    if (!store.posts.has(postId)) throw new NotFoundError('Post not found');
    let comments = store.comments.get(postId);
    if (!comments) {
      comments = [];
      store.comments.set(postId, comments);
    }
    return comments;
  }

  return {
    add(postId: number, content: string, author: string): Comment {
      const comments = commentsOf(postId);
      const comment: Comment = {
        id: store.commentIds.next(),
        content,
        author,
        postId,
        createdAt: new Date().toISOString(),
      };
      comments.push(comment);
      return comment;
    },

    /** Oldest first. */
    listFor(postId: number): Comment[] {
      return [...commentsOf(postId)];
    },

    count(postId: number): number {
      return store.comments.get(postId)?.length ?? 0;
    },
  };
}
