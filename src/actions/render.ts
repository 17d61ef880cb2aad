/**
 * Plain-text rendering of cluster state, laid out the way kubectl prints it
 */

import type {
  DeploymentDetail,
  NamespaceListing,
} from '../infrastructure/kubernetes/client';

const COLUMN_GAP = '   ';

/**
 * Left-aligned table; every column but the last is padded to its widest cell
 */
export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)),
  );
  const line = (cells: string[]): string =>
    cells
      .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join(COLUMN_GAP);

  return [line(headers), ...rows.map(line)].join('\n');
}

/**
 * Human-readable age, same buckets as kubectl
 */
export function formatAge(createdAt: Date | undefined, now: Date): string {
  if (!createdAt) return '<unknown>';

  const seconds = Math.floor((now.getTime() - createdAt.getTime()) / 1000);
  if (seconds < -1) return '<invalid>';
  if (seconds < 0) return '0s';
  if (seconds < 120) return `${seconds}s`;

  const minutes = Math.floor(seconds / 60);
  if (minutes < 10) {
    const s = seconds % 60;
    return s === 0 ? `${minutes}m` : `${minutes}m${s}s`;
  }
  if (minutes < 180) return `${minutes}m`;

  const hours = Math.floor(minutes / 60);
  if (hours < 8) {
    const m = minutes % 60;
    return m === 0 ? `${hours}h` : `${hours}h${m}m`;
  }
  if (hours < 48) return `${hours}h`;

  const days = Math.floor(hours / 24);
  if (hours < 24 * 8) {
    const h = hours % 24;
    return h === 0 ? `${days}d` : `${days}d${h}h`;
  }
  if (days < 365 * 2) return `${days}d`;

  const years = Math.floor(days / 365);
  if (years < 8) {
    const d = days % 365;
    return d === 0 ? `${years}y` : `${years}y${d}d`;
  }
  return `${years}y`;
}

/**
 * `get all`-style listing for one namespace
 */
export function renderNamespaceListing(
  namespace: string,
  listing: NamespaceListing,
  now: Date,
): string {
  const sections: string[] = [];
  const age = (createdAt: Date | undefined): string => formatAge(createdAt, now);

  if (listing.pods.length > 0) {
    sections.push(
      renderTable(
        ['NAME', 'READY', 'STATUS', 'RESTARTS', 'AGE'],
        listing.pods.map((p) => [
          `pod/${p.name}`,
          `${p.readyContainers}/${p.totalContainers}`,
          p.status,
          String(p.restarts),
          age(p.createdAt),
        ]),
      ),
    );
  }

  if (listing.services.length > 0) {
    sections.push(
      renderTable(
        ['NAME', 'TYPE', 'CLUSTER-IP', 'EXTERNAL-IP', 'PORT(S)', 'AGE'],
        listing.services.map((s) => [
          `service/${s.name}`,
          s.type,
          s.clusterIP,
          s.externalIP,
          s.ports,
          age(s.createdAt),
        ]),
      ),
    );
  }

  if (listing.daemonSets.length > 0) {
    sections.push(
      renderTable(
        ['NAME', 'DESIRED', 'CURRENT', 'READY', 'UP-TO-DATE', 'AVAILABLE', 'AGE'],
        listing.daemonSets.map((d) => [
          `daemonset.apps/${d.name}`,
          String(d.desired),
          String(d.current),
          String(d.ready),
          String(d.upToDate),
          String(d.available),
          age(d.createdAt),
        ]),
      ),
    );
  }

  if (listing.deployments.length > 0) {
    sections.push(
      renderTable(
        ['NAME', 'READY', 'UP-TO-DATE', 'AVAILABLE', 'AGE'],
        listing.deployments.map((d) => [
          `deployment.apps/${d.name}`,
          `${d.ready}/${d.desired}`,
          String(d.upToDate),
          String(d.available),
          age(d.createdAt),
        ]),
      ),
    );
  }

  if (listing.replicaSets.length > 0) {
    sections.push(
      renderTable(
        ['NAME', 'DESIRED', 'CURRENT', 'READY', 'AGE'],
        listing.replicaSets.map((r) => [
          `replicaset.apps/${r.name}`,
          String(r.desired),
          String(r.current),
          String(r.ready),
          age(r.createdAt),
        ]),
      ),
    );
  }

  if (listing.statefulSets.length > 0) {
    sections.push(
      renderTable(
        ['NAME', 'READY', 'AGE'],
        listing.statefulSets.map((s) => [
          `statefulset.apps/${s.name}`,
          `${s.ready}/${s.desired}`,
          age(s.createdAt),
        ]),
      ),
    );
  }

  if (sections.length === 0) {
    return `No resources found in ${namespace} namespace.`;
  }
  return sections.join('\n\n');
}

function renderMap(map: Record<string, string>): string {
  const entries = Object.entries(map);
  if (entries.length === 0) return '<none>';
  return entries.map(([key, value]) => `${key}=${value}`).join('\n' + ' '.repeat(24));
}

/**
 * `describe deployment`-style summary
 */
export function renderDeploymentDescription(detail: DeploymentDetail): string {
  const field = (label: string, value: string): string => `${`${label}:`.padEnd(24)}${value}`;

  const lines = [
    field('Name', detail.name),
    field('Namespace', detail.namespace),
    field('CreationTimestamp', detail.createdAt ? detail.createdAt.toUTCString() : '<unknown>'),
    field('Labels', renderMap(detail.labels)),
    field('Annotations', renderMap(detail.annotations)),
    field('Selector', renderMap(detail.selector)),
    field(
      'Replicas',
      `${detail.replicas} desired | ${detail.updatedReplicas} updated | ${detail.totalReplicas} total | ` +
        `${detail.availableReplicas} available | ${detail.unavailableReplicas} unavailable`,
    ),
    field('StrategyType', detail.strategy),
    field('Pod Annotations', renderMap(detail.podTemplateAnnotations)),
  ];

  if (detail.conditions.length === 0) {
    lines.push(field('Conditions', '<none>'));
  } else {
    const table = renderTable(
      ['Type', 'Status', 'Reason'],
      [['----', '------', '------'], ...detail.conditions.map((c) => [c.type, c.status, c.reason ?? ''])],
    );
    lines.push('Conditions:', ...table.split('\n').map((row) => `  ${row}`));
  }

  return lines.join('\n');
}
