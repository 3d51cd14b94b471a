import express, { Request, Response, Router } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { requestGovernorMiddleware } from '../middleware/requestGovernor.js';
import { noCacheMiddleware } from '../middleware/securityHeaders.js';
import { validateBody } from '../middleware/validation.js';
import { extractionSchemas, type TextExtractionBody } from '../validation/extractionSchemas.js';
import { performExtraction, type ExtractedData } from '../extraction/text/TextExtractor.js';
import type { ExtractionKind } from '../extraction/text/extractionKind.js';
import type { RequestGovernor } from '../security/RequestGovernor.js';
import { ExtractionError } from '../types/errors.js';
import { createChildLogger } from '../utils/logger.js';

export interface TextExtractionResponse {
  success: boolean;
  extracted_data: ExtractedData;
  original_text: string;
  extraction_type: ExtractionKind;
  timestamp: string;
}

function countMatches(data: ExtractedData): Record<string, number> {
  return Object.fromEntries(
    Object.entries(data).map(([key, values]) => [key, values?.length ?? 0])
  );
}

/**
 * Create text extraction routes
 */
export function createTextExtractionRouter(governor: RequestGovernor): Router {
  const router = express.Router();

  /**
   * POST /extract
   * Extract emails, phone numbers, dates, numbers or URLs from free text
   */
  router.post(
    '/extract',
    noCacheMiddleware,
    requestGovernorMiddleware(governor),
    validateBody(extractionSchemas.text.body),
    asyncHandler(async (req: Request, res: Response) => {
      const body: TextExtractionBody = req.body;
      const text = governor.sanitize(body.text);
      const log = createChildLogger({ extractionType: body.extraction_type });

      let extracted: ExtractedData;
      try {
        extracted = performExtraction(text, body.extraction_type);
      } catch (error) {
        throw new ExtractionError(error instanceof Error ? error.message : String(error));
      }

      log.debug({ textLength: text.length, matches: countMatches(extracted) }, 'Text extraction completed');

      const response: TextExtractionResponse = {
        success: true,
        extracted_data: extracted,
        original_text: text,
        extraction_type: body.extraction_type,
        timestamp: new Date().toISOString(),
      };
      res.json(response);
    })
  );

  return router;
}
