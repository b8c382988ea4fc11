import { LogLevel, log } from 'crawlee';

log.setLevel(LogLevel.OFF);
