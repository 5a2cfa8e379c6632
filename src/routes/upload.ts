import express, { type Request, type Response } from 'express';
import multer from 'multer';
import path from 'path';
import { randomUUID } from 'crypto';

import type { StorageLayout } from '../config/storage';
import { ValidationError } from '../errors';

export function createUploadRouter(storage: StorageLayout): express.Router {
  const diskStorage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, storage.uploads);
    },
    filename: (_req, file, cb) => {
      const extension = path.extname(file.originalname);
      cb(null, `${Date.now()}-${randomUUID()}${extension}`);
    }
  });
  const upload = multer({ storage: diskStorage });
  const router = express.Router();

  router.post('/', upload.single('file'), (req: Request, res: Response) => {
    if (!req.file) {
      throw new ValidationError('No file uploaded.', ['file']);
    }

    // Relative to the storage root, ready to be used as a task's sourcePath.
    const sourcePath = path.relative(storage.root, req.file.path).replace(/\\/g, '/');

    res.status(201).json({
      message: 'File uploaded successfully.',
      file: {
        originalName: req.file.originalname,
        storedName: req.file.filename,
        mimeType: req.file.mimetype,
        size: req.file.size,
        sourcePath
      }
    });
  });

  return router;
}
