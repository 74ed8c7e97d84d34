import { setLogLevel } from '../src/util/logger';

setLogLevel('silent');
