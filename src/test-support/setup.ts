import { Logger } from '../logger';

Logger.setSilent(true);
