import multer from "multer";
import { MAX_UPLOAD_FILE_SIZE } from "./constants";
import { RequestValidationError } from "./errors";

/**
 * Multer upload configuration for resume and job description files.
 * Files stay in memory: they are turned into document sources right away
 * and never written to disk. Only PDF files up to 10 MB are accepted.
 */
export const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_FILE_SIZE },
  fileFilter: (req, file, cb) => {
    if (file.mimetype === "application/pdf") {
      cb(null, true);
    } else {
      cb(new RequestValidationError("Only PDF files are allowed!"));
    }
  },
});
