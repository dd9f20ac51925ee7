import { Router } from 'express';
import { analyzeDayController } from '@/controllers/day-analysis.controller';

const router = Router();

router.post('/day', analyzeDayController);

export default router;
