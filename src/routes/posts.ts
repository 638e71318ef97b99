import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { requireAuth, currentUser, AuthRequest } from '../middleware/auth';
import { parseBody, parseId } from '../middleware/validate';
import { Services } from '../services';
import { LikeResult, Post, PostView } from '../types';

const createSchema = z.object({
  title: z.string().min(1).max(200),
  content: z.string().min(1),
});

const updateSchema = z.object({
  // null means "leave unchanged", same as an absent field
  title: z.string().min(1).max(200).nullish(),
  content: z.string().min(1).nullish(),
});

const commentSchema = z.object({
  content: z.string().min(1).max(1000),
});

export function createPostsRouter({ auth, posts, likes, comments }: Services): Router {
  const router = Router();
  const authenticated = requireAuth(auth);

  const toView = (post: Post): PostView => ({
    ...post,
    likesCount: likes.count(post.id),
    commentsCount: comments.count(post.id),
  });

  // GET /api/posts
  router.get('/', (_req: Request, res: Response) => {
    res.json(posts.listAll().map(toView));
  });

  // POST /api/posts
  router.post('/', authenticated, (req: AuthRequest, res: Response) => {
    const { title, content } = parseBody(createSchema, req.body);
    const post = posts.create(title, content, currentUser(req));
    res.status(201).json(toView(post));
  });

  // GET /api/posts/:id
  router.get('/:id', (req: Request, res: Response) => {
    res.json(toView(posts.get(parseId(req.params.id))));
  });

  // PUT /api/posts/:id
  router.put('/:id', authenticated, (req: AuthRequest, res: Response) => {
    const id = parseId(req.params.id);
    const patch = parseBody(updateSchema, req.body);
    res.json(toView(posts.update(id, patch, currentUser(req))));
  });

  // DELETE /api/posts/:id
  router.delete('/:id', authenticated, (req: AuthRequest, res: Response) => {
    posts.delete(parseId(req.params.id), currentUser(req));
    res.json({ message: 'Post deleted successfully' });
  });

  // POST /api/posts/:id/like
  router.post('/:id/like', authenticated, (req: AuthRequest, res: Response) => {
    const likesCount = likes.like(parseId(req.params.id), currentUser(req));
    const body: LikeResult = { message: 'Post liked successfully', likesCount };
    res.json(body);
  });

  // DELETE /api/posts/:id/like
  router.delete('/:id/like', authenticated, (req: AuthRequest, res: Response) => {
    const likesCount = likes.unlike(parseId(req.params.id), currentUser(req));
    const body: LikeResult = { message: 'Post unliked successfully', likesCount };
    res.json(body);
  });

  // POST /api/posts/:id/comment
  router.post('/:id/comment', authenticated, (req: AuthRequest, res: Response) => {
    const id = parseId(req.params.id);
    const { content } = parseBody(commentSchema, req.body);
    res.status(201).json(comments.add(id, content, currentUser(req)));
  });

  // GET /api/posts/:id/comments
  router.get('/:id/comments', (req: Request, res: Response) => {
    res.json(comments.listFor(parseId(req.params.id)));
  });

  return router;
}
