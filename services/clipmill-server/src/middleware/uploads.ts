import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { rm } from 'fs/promises';
import multer from 'multer';
import {
  allowedExtensions,
  extensionOf,
  isAllowedFile,
  LengthRequiredError,
  PayloadTooLargeError,
  UnsupportedFormatError,
  type UploadKind,
} from 'clipmill';

export interface UploadOptions {
  uploadDir: string;
  maxFileSize: number;
  maxFiles: number;
}

/**
 * Rejects a request whose declared body is over the limit before multer
 * writes anything. A body without a Content-Length (chunked) is refused, so the
 * declared length always bounds what can reach the disk.
 */
export function createContentLengthGuard(maxTotalSize: number) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const declared = Number.parseInt(req.header('content-length') ?? '', 10);
    if (!Number.isFinite(declared) || req.header('transfer-encoding') !== undefined) {
      next(new LengthRequiredError());
      return;
    }
    if (declared > maxTotalSize) {
      next(new PayloadTooLargeError(declared, maxTotalSize));
      return;
    }
    next();
  };
}

/**
 * Streams uploads to `uploadDir` under random names. The extension is checked
 * before a file is written and the size limit cuts a file off mid-stream.
 */
export function createUploader(kind: UploadKind, options: UploadOptions) {
  return multer({
    storage: multer.diskStorage({
      destination: options.uploadDir,
      filename: (_req, file, callback) => {
        callback(null, `${randomUUID()}.${extensionOf(file.originalname)}`);
      },
    }),
    limits: {
      fileSize: options.maxFileSize,
      files: options.maxFiles,
    },
    fileFilter: (_req, file, callback) => {
      if (!isAllowedFile(file.originalname, kind)) {
        callback(new UnsupportedFormatError(file.originalname, allowedExtensions(kind)));
        return;
      }
      callback(null, true);
    },
  });
}

export function uploadedFiles(req: Request): Express.Multer.File[] {
  if (Array.isArray(req.files)) return req.files;
  if (req.files) return Object.values(req.files).flat();
  return req.file ? [req.file] : [];
}

/** Resolves even when a removal fails; the sweeper reclaims what is left. */
export async function removeUploads(files: readonly Express.Multer.File[]): Promise<void> {
  const results = await Promise.allSettled(files.map((file) => rm(file.path, { force: true })));
  for (const result of results) {
    if (result.status === 'rejected') {
      // eslint-disable-next-line no-console
      console.error('[clipmill] failed to remove staged upload', result.reason);
    }
  }
}
