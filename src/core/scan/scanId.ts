import { v7 as uuidv7, validate } from "uuid";

/** UUIDv7: 48-bit millisecond timestamp prefix, then random bits. */
export type ScanIdGenerator = () => string;

export const generateScanId: ScanIdGenerator = () => uuidv7();

export const isScanId = (value: string): boolean => validate(value);
