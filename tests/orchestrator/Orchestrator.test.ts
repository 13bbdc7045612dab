import { describe, expect, it } from 'vitest';
import {
  EXIT_OK,
  EXIT_STACK_UNHEALTHY,
  Orchestrator,
  type OrchestratorOptions,
} from '../../src/orchestrator/Orchestrator';
import type { ServiceSpec } from '../../src/supervisor/types';
import { StackConfigError } from '../../src/util/errors';
import { FakeLauncher, FakePortRegistry, FakeProbe, FakeResolver, makeSpec, VirtualClock } from '../helpers/stack';

function service(name: string, overrides: Partial<ServiceSpec> = {}): ServiceSpec {
  return makeSpec({ name, expectedOwnerNames: [ name ], ...overrides });
}

/** A host where a launched service binds its port and answers health checks there. */
function host() {
  const clock = new VirtualClock();
  const ports = new FakePortRegistry();
  const launcher = new FakeLauncher(clock);
  launcher.onLaunch = (port, request) => {
    ports.bind(port, request.name);
  };
  const probe = new FakeProbe((port) => ports.owners.has(port), clock);
  const resolver = new FakeResolver('/opt/svc/bin/svc');
  return { clock, ports, launcher, probe, resolver };
}

function orchestrate(
  env: ReturnType<typeof host>,
  services: ServiceSpec[],
  extra: Partial<OrchestratorOptions> = {},
): Orchestrator {
  return new Orchestrator({ ...env, services, workDir: '/tmp/stack', ...extra });
}

describe('Orchestrator', () => {
  describe('validation', () => {
    it('rejects duplicate service names', () => {
      expect(() => orchestrate(host(), [ service('a'), service('a') ]))
        .toThrow(new StackConfigError('Service a is declared twice'));
    });

    it('rejects an empty port range', () => {
      expect(() => orchestrate(host(), [ service('a', { portRange: []}) ]))
        .toThrow('Service a has an empty port range');
    });

    it('rejects a dependency on an undeclared service', () => {
      expect(() => orchestrate(host(), [ service('b', { dependsOn: [{ service: 'zzz' }]}) ]))
        .toThrow('Service b depends on unknown service zzz');
    });

    it('rejects a service declared before its dependency', () => {
      expect(() => orchestrate(host(), [ service('b', { dependsOn: [{ service: 'a' }]}), service('a') ]))
        .toThrow('Service b must be declared after its dependency a');
    });

    it('accepts a dependency on a disabled service and blocks the dependent', async () => {
      const env = host();
      const orchestrator = orchestrate(env, [ service('b', { dependsOn: [{ service: 'a' }]}) ], { disabled: [ 'a' ]});

      const report = await orchestrator.run();

      expect(Object.keys(report.services)).toEqual([ 'b' ]);
      expect(report.services.b.status).toBe('dependency-unavailable');
      expect(report.services.b.detail).toBe('a did not become healthy');
      expect(env.launcher.launches).toHaveLength(0);
    });
  });

  describe('reporting', () => {
    it('reports the url on the scheme the health endpoint answered on', async () => {
      const env = host();
      const report = await orchestrate(env, [
        service('db', { healthCheck: { kind: 'http', paths: [ '/ping' ], acceptedStatus: [ 204 ], schemes: [ 'http', 'https' ]}}),
      ], {
        probe: { probe: async () => ({ healthy: true, method: 'http', status: 204, scheme: 'https' }) },
      }).run();

      expect(report.services.db.url).toBe('https://127.0.0.1:9090');
    });

    it('exits 0 when only an optional service failed', async () => {
      const env = host();
      const report = await orchestrate(env, [
        service('a', { portRange: [ 9090 ]}),
        service('b', { portRange: [ 9090 ], required: false }),
      ]).run();

      expect(report.ok).toBe(true);
      expect(report.exitCode).toBe(EXIT_OK);
      expect(report.services.a).toEqual({
        status: 'healthy',
        required: true,
        port: 9090,
        url: 'http://127.0.0.1:9090',
        ownedByUs: true,
        pid: 1000,
        softSuccess: false,
        attemptedPorts: [ 9090 ],
        executable: '/opt/svc/bin/svc',
      });
      expect(report.services.b).toEqual({
        status: 'exhausted-port-range',
        required: false,
        ownedByUs: false,
        softSuccess: false,
        attemptedPorts: [],
        executable: '/opt/svc/bin/svc',
        detail: 'tried no ports',
      });
    });

    it('exits 3 when a required service failed', async () => {
      const report = await orchestrate(host(), [
        service('a', { portRange: [ 9090 ]}),
        service('b', { portRange: [ 9090 ]}),
      ]).run();

      expect(report.ok).toBe(false);
      expect(report.exitCode).toBe(EXIT_STACK_UNHEALTHY);
    });

    it('reports detect-only runs on an empty host as not running', async () => {
      const env = host();
      const report = await orchestrate(env, [ service('a') ], { detectOnly: true }).run();

      expect(report.services.a.status).toBe('not-running');
      expect(report.exitCode).toBe(EXIT_STACK_UNHEALTHY);
      expect(env.launcher.launches).toHaveLength(0);
    });
  });

  it('launches nothing on a second run against a healthy stack', async () => {
    const env = host();
    const services = [ service('a', { portRange: [ 9090 ]}), service('b', { portRange: [ 9100 ]}) ];

    const first = await orchestrate(env, services).run();
    const second = await orchestrate(env, services).run();

    expect(first.services.a.ownedByUs).toBe(true);
    expect(env.launcher.launches).toHaveLength(2);
    expect(second.services.a).toMatchObject({ status: 'healthy', port: 9090, ownedByUs: false });
    expect(second.services.b).toMatchObject({ status: 'healthy', port: 9100, ownedByUs: false });
    expect(second.exitCode).toBe(EXIT_OK);
  });

  it('hands upstream ports to dependents when running concurrently', async () => {
    const env = host();
    const services = [
      service('a', { portRange: [ 9090 ]}),
      service('b', {
        portRange: [ 9100 ],
        dependsOn: [{ service: 'a' }],
        buildArgs: (port, ctx) => [ '--port', String(port), '--upstream', String(ctx.upstream.get('a')) ],
      }),
    ];

    const report = await orchestrate(env, services, { concurrent: true }).run();

    expect(report.exitCode).toBe(EXIT_OK);
    const launchB = env.launcher.launches.find((launch) => launch.request.name === 'b');
    expect(launchB?.request.args).toEqual([ '--port', '9100', '--upstream', '9090' ]);
  });
});
