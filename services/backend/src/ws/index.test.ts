import { Server } from 'socket.io';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { initWs } from './index';

describe('initWs', () => {
  const io = new Server();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('broadcasts progress on the progress namespace', () => {
    const emit = vi.spyOn(io.of('/ws/progress'), 'emit');
    const observer = initWs(io);

    observer('Summarizing part 1 of 2...', 0.25);
    observer('Making API request...');

    expect(emit.mock.calls).toEqual([
      ['progress', { message: 'Summarizing part 1 of 2...', progress: 0.25 }],
      ['progress', { message: 'Making API request...' }]
    ]);
  });
});
