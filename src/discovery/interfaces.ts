import os, { type NetworkInterfaceInfo } from "node:os";
import { TrackerError } from "../infra/errors.js";
import { WILDCARD_ADDRESS } from "../protocol/constants.js";

export type NetworkInterfaceChoice = {
  name: string;
  address: string;
  mac?: string;
};

export type SourceAddress = {
  mac: string;
  ip: string;
};

type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

function externalIpv4(table: InterfaceTable): Array<{ name: string; info: NetworkInterfaceInfo }> {
  const result: Array<{ name: string; info: NetworkInterfaceInfo }> = [];
  for (const [name, infos] of Object.entries(table)) {
    for (const info of infos ?? []) {
      if (info.family === "IPv4" && !info.internal) {
        result.push({ name, info });
      }
    }
  }
  return result;
}

/** Interfaces a scan can be bound to. The wildcard entry always comes first. */
export function listNetworkInterfaces(
  table: InterfaceTable = os.networkInterfaces(),
): NetworkInterfaceChoice[] {
  return [
    { name: "All Interfaces", address: WILDCARD_ADDRESS },
    ...externalIpv4(table).map(({ name, info }) => ({ name, address: info.address, mac: info.mac })),
  ];
}

/**
 * Pick the MAC and IP written into the request's source block: the interface
 * owning `interfaceAddress`, or the first external IPv4 interface for the wildcard.
 */
export function resolveSourceAddress(
  interfaceAddress: string,
  table: InterfaceTable = os.networkInterfaces(),
): SourceAddress {
  const candidates = externalIpv4(table);
  const match =
    interfaceAddress === WILDCARD_ADDRESS
      ? candidates[0]
      : candidates.find(({ info }) => info.address === interfaceAddress);
  if (!match) {
    throw new TrackerError(
      "SOCKET_ERROR",
      interfaceAddress === WILDCARD_ADDRESS
        ? "no external IPv4 interface available"
        : `no local interface has address ${interfaceAddress}`,
    );
  }
  return { mac: match.info.mac, ip: match.info.address };
}
