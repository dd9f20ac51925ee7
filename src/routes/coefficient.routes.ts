import { Router } from 'express';
import { calculateCoefficientController } from '@/controllers/coefficient.controller';

const router = Router();

router.post('/calculate', calculateCoefficientController);

export default router;
