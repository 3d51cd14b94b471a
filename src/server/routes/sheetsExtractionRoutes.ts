import express, { Request, Response, Router } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { requestGovernorMiddleware } from '../middleware/requestGovernor.js';
import { noCacheMiddleware } from '../middleware/securityHeaders.js';
import { validateBody } from '../middleware/validation.js';
import { extractionSchemas, type SheetsExtractionBody } from '../validation/extractionSchemas.js';
import { extractSheetsInfo, type SheetsInfo, type UrlType } from '../extraction/sheets/SheetsIdExtractor.js';
import type { RequestGovernor } from '../security/RequestGovernor.js';
import { ExtractionError } from '../types/errors.js';
import { createChildLogger } from '../utils/logger.js';

export interface SheetsExtractionResponse {
  success: boolean;
  document_id: string | null;
  sheet_ids: string[];
  original_url: string;
  url_type: UrlType;
  timestamp: string;
}

/**
 * Create Google Sheets extraction routes
 */
export function createSheetsExtractionRouter(governor: RequestGovernor): Router {
  const router = express.Router();

  /**
   * POST /extract
   * Extract the document id and sheet gids from a Sheets URL or bare id
   */
  router.post(
    '/extract',
    noCacheMiddleware,
    requestGovernorMiddleware(governor),
    validateBody(extractionSchemas.sheets.body),
    asyncHandler(async (req: Request, res: Response) => {
      const body: SheetsExtractionBody = req.body;
      const url = governor.sanitize(body.url);

      let info: SheetsInfo;
      try {
        info = extractSheetsInfo(url);
      } catch (error) {
        throw new ExtractionError(error instanceof Error ? error.message : String(error));
      }

      createChildLogger().debug({
        urlType: info.urlType,
        hasDocumentId: info.documentId !== null,
        sheetCount: info.sheetIds.length,
      }, 'Sheets extraction completed');

      const response: SheetsExtractionResponse = {
        success: info.documentId !== null,
        document_id: info.documentId,
        sheet_ids: info.sheetIds,
        original_url: url,
        url_type: info.urlType,
        timestamp: new Date().toISOString(),
      };
      res.json(response);
    })
  );

  return router;
}
