import { matchesSelector, type Labels } from "../metrics/labels.js";
import type { ScrapeTargetDescriptor } from "./scrapeTarget.js";

export interface ManifestMetadata {
  name: string;
  namespace: string;
  labels?: Labels;
}

export interface ServiceManifest {
  apiVersion: "v1";
  kind: "Service";
  metadata: ManifestMetadata;
  spec: {
    selector: Labels;
    ports: Array<{ name: string; port: number; targetPort: number; protocol: "TCP" }>;
  };
}

export interface ServiceMonitorManifest {
  apiVersion: "monitoring.coreos.com/v1";
  kind: "ServiceMonitor";
  metadata: ManifestMetadata;
  spec: {
    selector: { matchLabels: Labels };
    namespaceSelector?: { matchNames: string[] };
    endpoints: Array<{ port: string; path: string; interval: string; scrapeTimeout: string; scheme: string }>;
  };
}

/**
 * The Service publishes the selector labels and the named port; pods behind it
 * are picked by the same labels.
 */
export function toServiceManifest(
  descriptor: ScrapeTargetDescriptor,
  opts: { name: string; namespace: string; port: number; targetPort?: number }
): ServiceManifest {
  return {
    apiVersion: "v1",
    kind: "Service",
    metadata: { name: opts.name, namespace: opts.namespace, labels: { ...descriptor.selector } },
    spec: {
      selector: { ...descriptor.selector },
      ports: [
        { name: descriptor.port, port: opts.port, targetPort: opts.targetPort ?? opts.port, protocol: "TCP" }
      ]
    }
  };
}

/**
 * `monitorLabels` are the labels the scraper uses to pick up monitors, e.g.
 * `{ release: "prometheus" }` for a Helm-installed operator.
 */
export function toServiceMonitorManifest(
  descriptor: ScrapeTargetDescriptor,
  opts: { name: string; namespace: string; monitorLabels?: Labels; targetNamespaces?: string[] }
): ServiceMonitorManifest {
  return {
    apiVersion: "monitoring.coreos.com/v1",
    kind: "ServiceMonitor",
    metadata: { name: opts.name, namespace: opts.namespace, labels: { ...(opts.monitorLabels ?? {}) } },
    spec: {
      selector: { matchLabels: { ...descriptor.selector } },
      ...(opts.targetNamespaces ? { namespaceSelector: { matchNames: [...opts.targetNamespaces] } } : {}),
      endpoints: [
        {
          port: descriptor.port,
          path: descriptor.path,
          interval: descriptor.interval,
          scrapeTimeout: descriptor.timeout,
          scheme: descriptor.scheme
        }
      ]
    }
  };
}

/** True when the monitor selects the service and the service exposes the monitored port. */
export function serviceMatchesMonitor(service: ServiceManifest, monitor: ServiceMonitorManifest): boolean {
  const labels = service.metadata.labels ?? {};
  if (!matchesSelector(monitor.spec.selector.matchLabels, labels)) return false;
  const ns = monitor.spec.namespaceSelector?.matchNames ?? [monitor.metadata.namespace];
  if (!ns.includes(service.metadata.namespace)) return false;
  return monitor.spec.endpoints.every((ep) => service.spec.ports.some((p) => p.name === ep.port));
}
