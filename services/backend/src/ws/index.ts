import type { Server } from 'socket.io';
import pino from 'pino';
import { config } from '../config';
import type { ProgressObserver } from '../types';

const log = pino({ name: 'ws', level: config.logLevel });

export interface ProgressEvent {
  message: string;
  progress?: number;
}

/** Opens the progress namespace and returns an observer that broadcasts to it. */
export function initWs(io: Server): ProgressObserver {
  const progressNamespace = io.of('/ws/progress');

  progressNamespace.on('connection', (socket) => {
    log.info({ id: socket.id }, 'progress ws connected');
    socket.on('disconnect', (reason) => {
      log.debug({ id: socket.id, reason }, 'progress ws disconnected');
    });
  });

  return (message, progress) => {
    const event: ProgressEvent = progress === undefined ? { message } : { message, progress };
    progressNamespace.emit('progress', event);
  };
}
