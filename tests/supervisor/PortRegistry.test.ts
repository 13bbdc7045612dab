import net from 'node:net';
import { describe, expect, it } from 'vitest';
import { matchesOwner, parseLsofOwner, SystemPortRegistry } from '../../src/supervisor/PortRegistry';

async function listening(): Promise<{ server: net.Server; port: number }> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server has no port');
  }
  return { server, port: address.port };
}

async function close(server: net.Server): Promise<void> {
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

/** A port that was just released. */
async function freePort(): Promise<number> {
  const { server, port } = await listening();
  await close(server);
  return port;
}

describe('PortRegistry', () => {
  describe('parseLsofOwner', () => {
    it('reads the first pid and command pair', () => {
      expect(parseLsofOwner('p4242\ncgrafana-server\nf12\np4243\ncother\n')).toEqual({ pid: 4242, name: 'grafana-server' });
    });

    it('returns undefined for empty output', () => {
      expect(parseLsofOwner('')).toBeUndefined();
    });
  });

  describe('matchesOwner', () => {
    it('compares names case-insensitively and ignores .exe', () => {
      expect(matchesOwner({ pid: 1, name: 'Prometheus.EXE' }, [ 'prometheus' ])).toBe(true);
      expect(matchesOwner({ pid: 1, name: 'grafana' }, [ 'grafana-server', 'grafana' ])).toBe(true);
    });

    it('does not match partial or unknown owners', () => {
      expect(matchesOwner({ pid: 1, name: 'prometheus-exporter' }, [ 'prometheus' ])).toBe(false);
      expect(matchesOwner(undefined, [ 'prometheus' ])).toBe(false);
    });
  });

  describe('SystemPortRegistry', () => {
    it('sees a listening port as bound', async () => {
      const { server, port } = await listening();

      try {
        await expect(new SystemPortRegistry().isBound(port)).resolves.toBe(true);
      } finally {
        await close(server);
      }
    });

    it('sees a released port as free', async () => {
      const port = await freePort();

      await expect(new SystemPortRegistry().isBound(port)).resolves.toBe(false);
    });

    it('resolves no owner for a port nobody listens on', async () => {
      const port = await freePort();

      await expect(new SystemPortRegistry().ownerOf(port)).resolves.toBeUndefined();
    });

    it('resolves no owner when the lookup times out', async () => {
      const { server, port } = await listening();

      try {
        await expect(new SystemPortRegistry(1).ownerOf(port)).resolves.toBeUndefined();
      } finally {
        await close(server);
      }
    });
  });
});
