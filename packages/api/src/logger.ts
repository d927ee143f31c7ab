import { createLogger } from '@modelledger/utils';

export const logger = createLogger('@modelledger/api');
