import { createHash } from 'crypto';

/** Hex SHA-256 of the document bytes, used only for change detection. */
export const computeDocumentDigest = (bytes: Buffer): string => createHash('sha256').update(bytes).digest('hex');
