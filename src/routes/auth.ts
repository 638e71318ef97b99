import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { parseBody } from '../middleware/validate';
import { Services } from '../services';

const registerSchema = z.object({
  username: z.string(),
  email: z.string(),
  password: z.string(),
});

const loginSchema = z.object({
  username: z.string(),
  password: z.string(),
});

export function createAuthRouter({ credentials, auth }: Services): Router {
  const router = Router();

  // POST /api/auth/register
  router.post('/register', async (req: Request, res: Response) => {
    const { username, email, password } = parseBody(registerSchema, req.body);
    const user = await credentials.register(username, email, password);
    res.status(201).json(user);
  });

  // POST /api/auth/login
  router.post('/login', async (req: Request, res: Response) => {
    const { username, password } = parseBody(loginSchema, req.body);
    res.json(await auth.login(username, password));
  });

  return router;
}
