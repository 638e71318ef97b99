/**
 * Process-local in-memory store.
 *
 * Every mutation the services perform on these maps runs as one synchronous
 * block, so on Node's single event loop no request can observe a
 * half-applied change.
 */

import { StoredUser, Post, Comment } from '../types';
import { IdSequence } from './sequence';

export interface Store {
  users: Map<string, StoredUser>;
  posts: Map<number, Post>;
  likes: Map<number, Set<string>>; // postId -> usernames
  comments: Map<number, Comment[]>; // postId -> oldest first
  postIds: IdSequence;
  commentIds: IdSequence;
}

export function createStore(): Store {
  return {
    users: new Map(),
    posts: new Map(),
    likes: new Map(),
    comments: new Map(),
    postIds: new IdSequence(),
    commentIds: new IdSequence(),
  };
}
