import { Router } from 'express';
import { distributeElectricityController } from '@/controllers/distribution.controller';

const router = Router();

router.post('/', distributeElectricityController);

export default router;
