import pino from 'pino';
import { setLogger } from '../src/logging.js';

setLogger(pino({ level: 'silent' }));
