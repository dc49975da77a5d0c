import { MulterOptions } from '@nestjs/platform-express/multer/interfaces/multer-options.interface';
import { mkdirSync } from 'fs';
import { diskStorage } from 'multer';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ComplaintsConfig } from '../../config/configuration';
import { ValidationError } from '../exceptions/domain.exceptions';
import { attachmentProblems, fileExtension } from './attachment.util';

export const COMPLAINT_UPLOAD_SUBDIR = 'complaints';

export function multerConfig(config: ComplaintsConfig): MulterOptions {
  const destination = join(config.uploadDir, COMPLAINT_UPLOAD_SUBDIR);
  const rules = {
    maxBytes: config.attachmentMaxBytes,
    allowedExtensions: config.attachmentAllowedExtensions,
  };

  return {
    storage: diskStorage({
      destination: (_req, _file, cb) => {
        mkdirSync(destination, { recursive: true });
        cb(null, destination);
      },
      filename: (_req, file, cb) => {
        cb(null, `${uuidv4()}.${fileExtension(file.originalname)}`);
      },
    }),
    limits: { fileSize: config.attachmentMaxBytes },
    fileFilter: (_req, file, cb) => {
      // size is unknown here; multer enforces it through `limits`
      const problems = attachmentProblems({ originalname: file.originalname }, rules);
      if (problems.length > 0) {
        cb(new ValidationError('Invalid attachment', { attachment: problems }), false);
        return;
      }
      cb(null, true);
    },
  };
}
