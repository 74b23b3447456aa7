import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InvalidRequestError } from '../common/errors/clusterscope.errors';
import { PortRole } from '../common/types/endpoint-kind';
import {
  CollectorConfig,
  HttpScheme,
  RolePorts,
  parsePortList,
  splitList,
} from '../config/configuration';

export interface ResolveOptions {
  hosts?: string;
  ports?: string;
  parallel?: number;
  hostnameMatch?: string;
}

/** Everything a collection pass needs to know about where to go. */
export interface ResolvedTargets {
  hosts: string[];
  ports: number[];
  rolePorts: RolePorts;
  parallel: number;
  hostnameFilter: RegExp | null;
  scheme: HttpScheme;
  requestTimeoutMs: number;
  probeTimeoutMs: number;
}

export interface WorkItem {
  host: string;
  port: number;
  hostname_port: string;
}

export function compileFilter(option: string, pattern: string | undefined): RegExp | null {
  if (pattern === undefined || pattern === '') {
    return null;
  }
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new InvalidRequestError(`Invalid regular expression for ${option}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
}

export function portsForRole(targets: ResolvedTargets, role: PortRole): number[] {
  switch (role) {
    case 'all':
      return targets.ports;
    case 'master':
      return [targets.rolePorts.master];
    case 'tserver':
      return [targets.rolePorts.tserver];
    case 'master-tserver':
      return [targets.rolePorts.master, targets.rolePorts.tserver];
    case 'ysql':
      return [targets.rolePorts.ysql];
    case 'node-exporter':
      return [targets.rolePorts.nodeExporter];
  }
}

@Injectable()
export class TargetResolverService {
  constructor(private readonly configService: ConfigService) {}

  resolve(options: ResolveOptions = {}): ResolvedTargets {
    const config = this.configService.get<CollectorConfig>('collector');
    if (!config) {
      throw new Error('Collector configuration not found');
    }

    const hosts = options.hosts !== undefined ? splitList(options.hosts) : config.hosts;
    const ports = options.ports !== undefined ? parsePortList(options.ports) : config.ports;
    const parallel = options.parallel ?? config.parallel;

    const problems: string[] = [];
    if (hosts.length === 0) problems.push('no hosts given');
    if (ports.length === 0) problems.push('no valid ports given');
    if (!Number.isInteger(parallel) || parallel < 1) problems.push('parallel must be a positive integer');
    if (problems.length > 0) {
      throw new InvalidRequestError('Invalid collection targets', problems);
    }

    return {
      hosts: [...new Set(hosts)],
      ports: [...new Set(ports)],
      rolePorts: { ...config.rolePorts },
      parallel,
      hostnameFilter: compileFilter('hostname-match', options.hostnameMatch),
      scheme: config.scheme,
      requestTimeoutMs: config.requestTimeoutMs,
      probeTimeoutMs: config.probeTimeoutMs,
    };
  }

  /** Host × port pairs serving the given role, narrowed by the hostname filter. */
  workList(targets: ResolvedTargets, role: PortRole): WorkItem[] {
    const ports = [...new Set(portsForRole(targets, role))];
    const items: WorkItem[] = [];
    for (const host of targets.hosts) {
      for (const port of ports) {
        const hostnamePort = `${host}:${port}`;
        if (targets.hostnameFilter && !targets.hostnameFilter.test(hostnamePort)) continue;
        items.push({ host, port, hostname_port: hostnamePort });
      }
    }
    return items;
  }
}
