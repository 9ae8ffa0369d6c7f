import { Router } from 'express';

export default function healthRouter(version: string) {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ message: 'Employee Management API is running', status: 'OK', version });
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  return router;
}
