import { Request, Response } from 'express';
import { learnCoefficient } from '@/services/coefficient-learner.service';
import { parseCoefficientRequest } from '@/services/request-parser.service';
import { logger } from '@/utils/logger';

/**
 * Learn the efficiency coefficient from daily (water, electricity) history.
 * A fallback to the default coefficient is still a successful answer; only an
 * internal failure (status "error") marks the response unsuccessful.
 */
export const calculateCoefficientController = async (req: Request, res: Response): Promise<void> => {
  try {
    const request = parseCoefficientRequest(req.body);
    const estimate = learnCoefficient(request);

    res.status(200).json({
      success: estimate.status !== 'error',
      data: estimate
    });
  } catch (error) {
    logger.error('Coefficient calculation error:', error);
    res.status(500).json({
      success: false,
      error: { message: 'Server error' }
    });
  }
};
