import { z } from 'zod';
import { EXTRACTION_KINDS, normalizeExtractionKindInput } from '../extraction/text/extractionKind.js';

export const MAX_TEXT_CHARS = 1048576;
export const MAX_URL_CHARS = 2048;

export const extractionSchemas = {
    text: {
        // A lower MAX_REQUEST_SIZE is enforced afterwards by the sanitizer (413)
        body: z.object({
            text: z.string({ required_error: 'Text is required' })
                .min(1, 'Text cannot be empty')
                .max(MAX_TEXT_CHARS, `Text cannot exceed ${MAX_TEXT_CHARS} characters`),
            extraction_type: z.preprocess(
                normalizeExtractionKindInput,
                z.enum(EXTRACTION_KINDS, {
                    errorMap: () => ({
                        message: `Invalid extraction type. Allowed types: ${EXTRACTION_KINDS.join(', ')}`,
                    }),
                })
            ),
        }),
    },

    sheets: {
        body: z.object({
            url: z.string({ required_error: 'URL is required' })
                .min(1, 'URL cannot be empty')
                .max(MAX_URL_CHARS, `URL cannot exceed ${MAX_URL_CHARS} characters`),
        }),
    },
};

export type TextExtractionBody = z.infer<typeof extractionSchemas.text.body>;
export type SheetsExtractionBody = z.infer<typeof extractionSchemas.sheets.body>;
