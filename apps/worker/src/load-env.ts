/**
 * Side-effect import: load .env before any module creates its logger from process.env
 */

import { initEnv } from '@objledger/config';

export const envResult = initEnv();
