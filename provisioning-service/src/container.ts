import { spawn } from 'child_process';
import net from 'net';
import { SERVICE, type ContainerConfig, type ContainerSpec } from './config.js';
import type { ResourceLedger } from './ensure.js';
import { RequestError, UnreachableError } from './errors.js';
import { waitFor, type RetryPolicy, type WaitOptions } from './retry.js';

export interface CommandResult {
  code: number | null;
  out: string;
  err: string;
}

export type CommandRunner = (cmd: string, args: string[]) => Promise<CommandResult>;
export type PortProbe = (host: string, port: number) => Promise<void>;

/** Run a command to completion and collect its output. Spawn failures resolve with code null. */
export const spawnCommand: CommandRunner = (cmd, args) =>
  new Promise<CommandResult>((resolve) => {
    const p = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const out: string[] = [];
    const err: string[] = [];
    p.stdout.on('data', (c: Buffer) => out.push(c.toString()));
    p.stderr.on('data', (c: Buffer) => err.push(c.toString()));
    p.on('error', (e: Error) => resolve({ code: null, out: '', err: e.message }));
    p.on('close', (code: number | null) => resolve({ code, out: out.join('').trim(), err: err.join('').trim() }));
  });

export const probeTcp: PortProbe = (host, port) =>
  new Promise<void>((resolve, reject) => {
    const socket = net.connect({ host, port });
    socket.setTimeout(3000);
    socket.once('connect', () => {
      socket.end();
      resolve();
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(new Error(`timeout connecting to ${host}:${port}`));
    });
    socket.once('error', (e) => {
      socket.destroy();
      reject(e);
    });
  });

export interface ContainerDeps {
  run: CommandRunner;
  probe: PortProbe;
  wait?: WaitOptions;
}

/** Build `run -d` arguments for a declared service. */
export function runArgs(spec: ContainerSpec, network: string): string[] {
  const args = ['run', '-d', '--name', spec.name, '--network', network, '--restart', 'unless-stopped'];
  for (const p of spec.ports) args.push('-p', p);
  for (const v of spec.volumes) args.push('-v', v);
  for (const [k, v] of Object.entries(spec.env)) args.push('-e', `${k}=${v}`);
  args.push(spec.image, ...spec.command);
  return args;
}

function failed(what: string, r: CommandResult): RequestError {
  return new RequestError(`${what} failed (exit ${r.code ?? 'spawn error'}): ${r.err || r.out || 'no output'}`);
}

type EngineState = { version: string };

/**
 * Make sure the container engine binary exists and the daemon answers.
 * An installed but stopped daemon is started through systemd and polled.
 */
async function ensureEngine(cfg: ContainerConfig, deps: ContainerDeps, policy: RetryPolicy, ledger: ResourceLedger) {
  const runtime = cfg.runtime;
  const info = async (): Promise<EngineState> => {
    const r = await deps.run(runtime, ['info', '--format', '{{.ServerVersion}}']);
    if (r.code !== 0) throw failed(`${runtime} info`, r);
    return { version: r.out };
  };
  await ledger.ensure<EngineState>({
    kind: 'engine',
    name: runtime,
    find: async () => {
      const v = await deps.run(runtime, ['--version']);
      if (v.code !== 0) throw new UnreachableError(`container engine ${runtime} is not installed: ${v.err || v.out}`);
      const r = await deps.run(runtime, ['info', '--format', '{{.ServerVersion}}']);
      return r.code === 0 ? { version: r.out } : null;
    },
    create: async () => {
      console.log(`[${SERVICE}] starting ${runtime} daemon via systemctl`);
      const r = await deps.run('systemctl', ['start', runtime]);
      if (r.code !== 0) throw failed(`systemctl start ${runtime}`, r);
      return await waitFor(`${runtime} daemon`, info, policy, deps.wait);
    },
  });
}

async function ensureNetwork(cfg: ContainerConfig, deps: ContainerDeps, ledger: ResourceLedger) {
  await ledger.ensure<string>({
    kind: 'network',
    name: cfg.network,
    find: async () => {
      const r = await deps.run(cfg.runtime, ['network', 'inspect', cfg.network]);
      return r.code === 0 ? cfg.network : null;
    },
    create: async () => {
      const r = await deps.run(cfg.runtime, ['network', 'create', cfg.network]);
      if (r.code !== 0) throw failed(`network create ${cfg.network}`, r);
      console.log(`[${SERVICE}] created network ${cfg.network}`);
      return cfg.network;
    },
  });
}

type ContainerState = { running: boolean };

async function ensureContainer(spec: ContainerSpec, cfg: ContainerConfig, deps: ContainerDeps, ledger: ResourceLedger) {
  await ledger.ensure<ContainerState>({
    kind: 'container',
    name: spec.name,
    find: async () => {
      const r = await deps.run(cfg.runtime, ['inspect', '--format', '{{.State.Running}}', spec.name]);
      if (r.code !== 0) return null;
      return { running: r.out === 'true' };
    },
    create: async () => {
      const r = await deps.run(cfg.runtime, runArgs(spec, cfg.network));
      if (r.code !== 0) throw failed(`run ${spec.name}`, r);
      console.log(`[${SERVICE}] started container ${spec.name} (${spec.image})`);
      return { running: true };
    },
    diff: (existing) => (existing.running ? null : 'container stopped'),
    update: async () => {
      const r = await deps.run(cfg.runtime, ['start', spec.name]);
      if (r.code !== 0) throw failed(`start ${spec.name}`, r);
      console.log(`[${SERVICE}] restarted container ${spec.name}`);
      return { running: true };
    },
  });
}

/** Engine, network, then each declared service running and accepting connections. */
export async function provisionContainers(cfg: ContainerConfig, deps: ContainerDeps, policy: RetryPolicy, ledger: ResourceLedger): Promise<void> {
  await ensureEngine(cfg, deps, policy, ledger);
  await ensureNetwork(cfg, deps, ledger);
  for (const spec of cfg.services) {
    await ensureContainer(spec, cfg, deps, ledger);
  }
  for (const spec of cfg.services) {
    const { host, port } = spec.ready;
    await waitFor(`${spec.name} on ${host}:${port}`, () => deps.probe(host, port), policy, deps.wait);
    ledger.annotate({ kind: 'container', name: spec.name }, `reachable on ${host}:${port}`);
  }
}
