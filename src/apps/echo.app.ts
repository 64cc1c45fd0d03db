/**
 * Echo Application
 * Default session logic served by the bundled entry point: greets the
 * client, echoes every event back, and ends the session on a "close" event.
 * The default export lets thread-based sessions load it in a worker.
 */

import type { SessionHandler } from '@/modules/session';

export const echoApp: SessionHandler = async (io) => {
  io.send({ command: 'output', spec: { type: 'text', content: 'Session started' } });

  for (;;) {
    const event = await io.receive();

    if (event.event === 'close') {
      io.send({ command: 'output', spec: { type: 'text', content: 'Bye' } });
      return;
    }

    io.send({
      command: 'output',
      task_id: event.task_id,
      spec: { type: 'text', content: `Received ${event.event}`, data: event.data },
    });
  }
};

export default echoApp;
