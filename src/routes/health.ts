import { Router } from 'express';

const router = Router();

router.get('/healthchecker', (_req, res) => {
  res.json({ message: 'Server alive.' });
});

export default router;
