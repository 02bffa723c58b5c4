/**
 * Machine document loading and export.
 *
 * A machine document (`vm_<name>.json`) carries a machine's interfaces and
 * its effective routes in the snake_case layout written by `export machines`.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { describeError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import type { RouteEntry } from "../network/types.js";
import type { MachineRouteSet } from "../routes/types.js";
import type { GatewayRoute } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

export const routeDocumentSchema = Type.Object({
  address_prefix: Type.String(),
  next_hop_type: Type.String(),
  next_hop_ip: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  route_origin: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export const machineDocumentSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  network_interfaces: Type.Array(
    Type.Object({
      name: Type.Optional(Type.String()),
      private_ip_addresses: Type.Array(Type.String()),
    }),
  ),
  effective_routes: Type.Array(routeDocumentSchema),
});

export const gatewayRoutesSchema = Type.Array(
  Type.Object({
    address_prefix: Type.String(),
    next_hop_type: Type.String(),
  }),
);

export type RouteDocument = Static<typeof routeDocumentSchema>;
export type MachineDocument = Static<typeof machineDocumentSchema>;

export const DEFAULT_GATEWAY_ROUTES: readonly GatewayRoute[] = [
  { addressPrefix: "172.20.4.0/22", nextHopType: "VirtualNetworkGateway" },
  { addressPrefix: "10.0.0.0/8", nextHopType: "VirtualNetworkGateway" },
];

const MACHINE_FILE = /^vm_.*\.json$/;

export type LoaderOptions = {
  logger?: Logger;
};

// =============================================================================
// Conversion
// =============================================================================

function toRouteEntry(route: RouteDocument): RouteEntry {
  return {
    addressPrefix: route.address_prefix,
    nextHopType: route.next_hop_type,
    nextHopIp: route.next_hop_ip ?? undefined,
    origin: route.route_origin ?? "Unknown",
  };
}

/**
 * Documents only carry machine-level routes, so every interface is given
 * the full list.
 */
export function machineFromDocument(doc: MachineDocument): MachineRouteSet {
  const routes = doc.effective_routes.map(toRouteEntry);
  return {
    name: doc.name,
    interfaces: doc.network_interfaces.map((nic, index) => ({
      name: nic.name ?? `${doc.name}-nic${index}`,
      privateIpAddresses: [...nic.private_ip_addresses],
      routes,
      source: "document",
    })),
    routes,
  };
}

/**
 * Writes the primary interface's routes, the ones the graph uses.
 */
export function machineToDocument(machine: MachineRouteSet): MachineDocument {
  return {
    name: machine.name,
    network_interfaces: machine.interfaces.map((nic) => ({
      name: nic.name,
      private_ip_addresses: [...nic.privateIpAddresses],
    })),
    effective_routes: (machine.interfaces[0]?.routes ?? []).map((route) => ({
      address_prefix: route.addressPrefix,
      next_hop_type: route.nextHopType,
      ...(route.nextHopIp ? { next_hop_ip: route.nextHopIp } : {}),
      route_origin: route.origin,
    })),
  };
}

export function parseMachineDocument(value: unknown): MachineDocument | null {
  return Value.Check(machineDocumentSchema, value) ? value : null;
}

// =============================================================================
// Loading
// =============================================================================

async function findMachineFiles(directory: string, logger: Logger): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findMachineFiles(fullPath, logger)));
    } else if (entry.isFile() && MACHINE_FILE.test(entry.name)) {
      files.push(fullPath);
    } else if (entry.isFile() && entry.name.endsWith(".json")) {
      logger.debug(`ignoring ${fullPath}: not a machine document`);
    }
  }
  return files;
}

/**
 * Load every `vm_*.json` under `directory`, recursively. Unparseable files
 * and documents missing required fields are skipped with a warning. When two
 * documents share a machine name the later one wins.
 */
export async function loadMachineDocuments(directory: string, options: LoaderOptions = {}): Promise<MachineRouteSet[]> {
  const logger = options.logger ?? getLogger("topology");
  const machines = new Map<string, MachineRouteSet>();

  for (const file of await findMachineFiles(directory, logger)) {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(file, "utf-8"));
    } catch (error) {
      logger.warn(`could not parse ${file}: ${describeError(error)}`);
      continue;
    }

    const doc = parseMachineDocument(raw);
    if (!doc) {
      const first = [...Value.Errors(machineDocumentSchema, raw)][0];
      logger.warn(`skipping ${file}: ${first ? `${first.path || "/"} ${first.message}` : "invalid document"}`);
      continue;
    }

    machines.set(doc.name, machineFromDocument(doc));
  }

  logger.info(`loaded ${machines.size} machine(s) from ${directory}`);
  return [...machines.values()];
}

/**
 * Read gateway routes. Without a file the defaults apply; a file that cannot
 * be read or validated also falls back to them, with a warning.
 */
export async function loadGatewayRoutes(file?: string, options: LoaderOptions = {}): Promise<GatewayRoute[]> {
  const logger = options.logger ?? getLogger("topology");
  const defaults = DEFAULT_GATEWAY_ROUTES.map((route) => ({ ...route }));
  if (!file) return defaults;

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf-8"));
  } catch (error) {
    logger.warn(`could not load gateway routes from ${file}, using defaults: ${describeError(error)}`);
    return defaults;
  }

  if (!Value.Check(gatewayRoutesSchema, raw)) {
    logger.warn(`invalid gateway routes in ${file}, using defaults`);
    return defaults;
  }

  return raw.map((route) => ({ addressPrefix: route.address_prefix, nextHopType: route.next_hop_type }));
}

// =============================================================================
// Export
// =============================================================================

export function machineFileName(name: string): string {
  return `vm_${name.replace(/[^A-Za-z0-9._-]/g, "_")}.json`;
}

/**
 * Write one document per machine into `directory`; returns the paths written.
 */
export async function writeMachineDocuments(
  directory: string,
  machines: readonly MachineRouteSet[],
  options: LoaderOptions = {},
): Promise<string[]> {
  const logger = options.logger ?? getLogger("topology");
  await mkdir(directory, { recursive: true });

  const written: string[] = [];
  for (const machine of machines) {
    const path = join(directory, machineFileName(machine.name));
    await writeFile(path, `${JSON.stringify(machineToDocument(machine), null, 2)}\n`, "utf-8");
    written.push(path);
  }

  logger.info(`wrote ${written.length} machine document(s) to ${directory}`);
  return written;
}
