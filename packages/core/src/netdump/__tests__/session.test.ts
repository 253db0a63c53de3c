import { describe, it, expect, afterEach } from 'vitest';
import { createServer, type Server, type Socket } from 'node:net';
import { ConnectionError, TimeoutError } from '@netdump/shared';
import { getRevision } from '../../protocol/revisions.ts';
import { FRAME_SIZE, decodeRequest, encodeResponseHeader } from '../../protocol/frame-codec.ts';
import type { DecodedCommand } from '../../protocol/types.ts';
import { NetdumpSession } from '../session.ts';
import { NetdumpClient } from '../netdump-client.ts';

const v1 = getRevision(1);

interface TestServer {
  server: Server;
  port: number;
  requests: DecodedCommand[];
}

let servers: Server[] = [];
let sockets: Socket[] = [];

function listen(answer: boolean): Promise<TestServer> {
  const requests: DecodedCommand[] = [];
  const server = createServer((socket) => {
    sockets.push(socket);
    socket.on('error', () => {});
    let pending = Buffer.alloc(0);
    socket.on('data', (chunk: Buffer) => {
      pending = Buffer.concat([pending, chunk]);
      while (pending.length >= FRAME_SIZE) {
        const request = decodeRequest(v1, pending.subarray(0, FRAME_SIZE));
        pending = pending.subarray(FRAME_SIZE);
        requests.push(request);
        if (answer) socket.write(encodeResponseHeader(v1, 'ok'));
      }
    });
  });
  servers.push(server);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Test server has no TCP address'));
        return;
      }
      resolve({ server, port: address.port, requests });
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

afterEach(async () => {
  for (const socket of sockets) socket.destroy();
  await Promise.all(servers.filter((server) => server.listening).map(closeServer));
  servers = [];
  sockets = [];
});

describe('NetdumpSession over TCP', () => {
  it('ejects and disconnects against a real socket', async () => {
    const { port, requests } = await listen(true);
    const client = new NetdumpClient({ host: '127.0.0.1', port });

    expect(await client.run('eject')).toEqual({ kind: 'ok', operation: 'eject' });
    expect(requests).toEqual([
      { kind: 'ejectDisc', code: 0x00000001 },
      { kind: 'disconnect', code: 0xffffffff },
    ]);
  });

  it('rejects with ConnectionError when nothing listens on the port', async () => {
    const { server, port } = await listen(true);
    await closeServer(server);

    const connecting = NetdumpSession.connect({ host: '127.0.0.1', port, revision: v1 });

    await expect(connecting).rejects.toBeInstanceOf(ConnectionError);
    await expect(connecting).rejects.toThrow(`Failed to connect to 127.0.0.1:${port}`);
  });

  it('fails a pending read with TimeoutError when the server goes quiet', async () => {
    const { port, requests } = await listen(false);
    const session = await NetdumpSession.connect({ host: '127.0.0.1', port, revision: v1, timeoutMs: 100 });

    await session.sendCommand('getDiscInfo');
    const header = session.readResponseHeader();

    await expect(header).rejects.toBeInstanceOf(TimeoutError);
    await expect(header).rejects.toThrow(`No activity from 127.0.0.1:${port} for 100 ms`);
    expect(requests.map((request) => request.kind)).toEqual(['getDiscInfo']);
    session.close();
  });
});
