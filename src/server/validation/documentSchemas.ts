import { z } from 'zod';

// Blank and null form/JSON values mean "not provided"
const optionalText = z.preprocess(
    (value) => (value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value),
    z.string().trim().optional()
);

// Enumerations stay open: unknown values are passed to the prompt as-is
const analysisOptions = {
    document_type: optionalText,
    user_role: optionalText,
    complexity_level: optionalText,
};

export const documentSchemas = {
    analyzeText: {
        body: z.object({
            text: z.string({ required_error: 'text is required', invalid_type_error: 'text must be a string' }),
            ...analysisOptions,
        }),
    },

    analyzeDocument: {
        body: z.object(analysisOptions),
    },

    askQuestion: {
        body: z.object({
            question: z.string({ required_error: 'question is required', invalid_type_error: 'question must be a string' }),
            document_id: optionalText,
            document_text: z.preprocess(
                (value) => (value === null ? undefined : value),
                z.string().optional()
            ),
        }),
    },

    getDocument: {
        params: z.object({
            documentId: z.string().trim().min(1, 'documentId is required'),
        }),
    },
};

export const chatSchemas = {
    appendRecord: {
        body: z.object({
            question: z.string().trim().min(1, 'question is required'),
            answer: z.string(),
            relevant_sections: z.array(z.string()).default([]),
            confidence_level: z.string().trim().min(1, 'confidence_level is required'),
            timestamp: z.string().datetime({ offset: true }).optional(),
        }),
    },
};

export type AnalyzeTextBody = z.infer<typeof documentSchemas.analyzeText.body>;
export type AnalyzeDocumentBody = z.infer<typeof documentSchemas.analyzeDocument.body>;
export type AskQuestionBody = z.infer<typeof documentSchemas.askQuestion.body>;
export type AppendChatBody = z.infer<typeof chatSchemas.appendRecord.body>;
