// Shared TypeScript types used across the server

export interface User {
  username: string;
  email: string;
}

export interface StoredUser extends User {
  passwordHash: string;
}

export interface Post {
  id: number;
  title: string;
  content: string;
  author: string;
  createdAt: string;
  updatedAt: string;
}

export interface PostView extends Post {
  likesCount: number;
  commentsCount: number;
}

export interface Comment {
  id: number;
  content: string;
  author: string;
  postId: number;
  createdAt: string;
}

export interface LikeResult {
  message: string;
  likesCount: number;
}

export interface TokenView {
  accessToken: string;
  tokenType: 'bearer';
}

export type AuthFailureReason =
  | 'expired'
  | 'invalid_signature'
  | 'missing_subject'
  | 'unknown_subject';

export type AuthResult =
  | { ok: true; username: string }
  | { ok: false; reason: AuthFailureReason };

// Request bodies

export interface UpdatePostBody {
  title?: string | null;
  content?: string | null;
}
