import { Algorithm } from 'jsonwebtoken';
import { Store } from '../models/store';
import { createAuthService } from './authService';
import { createCommentService } from './commentService';
import { createCredentialService } from './credentialService';
import { createLikeService } from './likeService';
import { createPostService } from './postService';

export interface ServiceOptions {
  jwtSecret: string;
  jwtAlgorithm: Algorithm;
  jwtExpiresInMinutes: number;
  bcryptRounds: number;
  clock?: () => number;
}

export type Services = ReturnType<typeof createServices>;

export function createServices(store: Store, options: ServiceOptions) {
  const credentials = createCredentialService(store, { bcryptRounds: options.bcryptRounds });
  return {
    credentials,
    auth: createAuthService(credentials, {
      secret: options.jwtSecret,
      algorithm: options.jwtAlgorithm,
      expiresInMinutes: options.jwtExpiresInMinutes,
      clock: options.clock,
    }),
    posts: createPostService(store),
    likes: createLikeService(store),
    comments: createCommentService(store),
  };
}
