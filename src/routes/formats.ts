import express, { type Request, type Response } from 'express';

import {
  CODEC_COMPRESSION_RATIOS,
  DEFAULT_COMPRESSION_RATIO,
  DEFAULT_FORMAT_MULTIPLIER,
  FORMAT_MULTIPLIERS,
  SUPPORTED_OUTPUT_FORMATS,
  SUPPORTED_VIDEO_CODECS
} from '../config/formats';

export const formatsRouter = express.Router();

formatsRouter.get('/', (_req: Request, res: Response) => {
  res.json({
    formats: {
      output: SUPPORTED_OUTPUT_FORMATS,
      videoCodecs: SUPPORTED_VIDEO_CODECS
    },
    estimation: {
      codecCompressionRatios: CODEC_COMPRESSION_RATIOS,
      formatMultipliers: FORMAT_MULTIPLIERS,
      defaultCompressionRatio: DEFAULT_COMPRESSION_RATIO,
      defaultFormatMultiplier: DEFAULT_FORMAT_MULTIPLIER
    }
  });
});
