/**
 * Storage Package Logger
 * ======================
 * Logger for the storage package with namespace '@modelledger/storage'
 */

import { createLogger } from '@modelledger/utils';

export const logger = createLogger('@modelledger/storage');
