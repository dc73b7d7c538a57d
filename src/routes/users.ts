/**
 * User API Routes
 *
 * A standalone router, mounted by the application under /api/users.
 */

import { Router, type Logger } from '../../framework/mod.ts';

export interface User {
  id: number;
  name: string;
}

export const USERS: readonly User[] = [
  { id: 1, name: 'Alice' },
  { id: 2, name: 'Bob' },
  { id: 3, name: 'Charlie' },
];

export function createUserRouter(logger?: Logger): Router {
  const router = new Router({ logger });

  router.get('/list', (_req, res) => {
    res.json(USERS);
  });

  router.get('/profile', (_req, res) => {
    res.json({ title: 'User Profile', message: 'User profile details from the modular router.' });
  });

  return router;
}
