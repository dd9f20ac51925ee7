import { Request, Response } from 'express';
import { distributeElectricity } from '@/services/energy-distribution.service';
import { parseDistributionRequest } from '@/services/request-parser.service';
import { logger } from '@/utils/logger';

export const distributeElectricityController = async (req: Request, res: Response): Promise<void> => {
  try {
    const request = parseDistributionRequest(req.body);
    const result = distributeElectricity(request);

    res.status(200).json({
      success: result.error === undefined,
      data: result
    });
  } catch (error) {
    logger.error('Distribution error:', error);
    res.status(500).json({
      success: false,
      error: { message: 'Server error' }
    });
  }
};
