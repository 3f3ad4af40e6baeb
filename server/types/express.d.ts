import 'express';

declare global {
  namespace Express {
    /** One document of a similarity request after validation */
    interface ValidatedDocument {
      id?: number;
      text: string;
    }

    /** Normalized body of POST /api/similarity */
    interface ValidatedSimilarityBody {
      documents: ValidatedDocument[];
      shingleSize?: number;
      numHashes?: number;
      similarityThreshold?: number;
      seed?: number;
      normalize: boolean;
    }

    interface Request {
      /** Set by validation middleware(s) after Zod-based normalization */
      validated?: {
        body?: ValidatedSimilarityBody;
      };
    }
  }
}

export {}; // ensure this file is treated as a module
