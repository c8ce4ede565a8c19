import { setLogLevel } from '../logger.js';

setLogLevel('error');
