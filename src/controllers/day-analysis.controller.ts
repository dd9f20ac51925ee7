import { Request, Response } from 'express';
import { analyzeDay } from '@/services/day-analysis.service';
import { parseDayAnalysisRequest } from '@/services/request-parser.service';
import { logger } from '@/utils/logger';

export const analyzeDayController = async (req: Request, res: Response): Promise<void> => {
  try {
    const input = parseDayAnalysisRequest(req.body);
    const result = analyzeDay(input);

    res.status(200).json({
      success: result.error === undefined,
      data: result
    });
  } catch (error) {
    logger.error('Day analysis error:', error);
    res.status(500).json({
      success: false,
      error: { message: 'Server error' }
    });
  }
};
