import ipaddr from "ipaddr.js";

export type IpAddress = ipaddr.IPv4 | ipaddr.IPv6;

const ipv4Pattern = /^(0|[1-9]\d{0,2})(\.(0|[1-9]\d{0,2})){3}$/;
const prefixPattern = /^(0|[1-9]\d{0,2})$/;

/**
 * Parse a peer address, unwrapping IPv4-mapped IPv6 addresses
 * (`::ffff:10.0.0.5`) so they match IPv4 networks.
 */
export function parseAddress(text: string): IpAddress | undefined {
  const trimmed = text.trim();
  // drop zone id
  const address = trimmed.includes("%")
    ? trimmed.slice(0, trimmed.indexOf("%"))
    : trimmed;
  if (address.includes(".") && !address.includes(":")) {
    if (!ipv4Pattern.test(address)) {
      return undefined;
    }
  } else if (!address.includes(":")) {
    return undefined;
  }
  if (!ipaddr.isValid(address)) {
    return undefined;
  }
  return ipaddr.process(address);
}

/**
 * An IP network in canonical CIDR form, host bits masked.
 */
export class NetworkEntry {
  private constructor(
    readonly address: IpAddress,
    readonly prefixLength: number
  ) {}

  /**
   * Parse `address/prefix` or a bare address (full prefix length).
   */
  static parse(text: string): NetworkEntry | undefined {
    const parts = text.trim().split("/");
    if (parts.length > 2) {
      return undefined;
    }
    const [addressText] = parts;
    if (addressText.includes("%")) {
      return undefined;
    }
    const address = parseAddressLiteral(addressText);
    if (!address) {
      return undefined;
    }
    const maxPrefix = address.kind() === "ipv4" ? 32 : 128;
    let prefixLength = maxPrefix;
    if (parts.length === 2) {
      const prefixText = parts[1];
      if (!prefixPattern.test(prefixText)) {
        return undefined;
      }
      prefixLength = Number(prefixText);
      if (prefixLength > maxPrefix) {
        return undefined;
      }
    }
    if (
      address instanceof ipaddr.IPv6 &&
      address.isIPv4MappedAddress() &&
      prefixLength >= 96
    ) {
      // mapped peers are matched as IPv4, see parseAddress
      const unwrapped = prefixLength - 96;
      return new NetworkEntry(
        mask(address.toIPv4Address(), unwrapped),
        unwrapped
      );
    }
    return new NetworkEntry(mask(address, prefixLength), prefixLength);
  }

  contains(address: IpAddress): boolean {
    const network = this.address;
    if (network instanceof ipaddr.IPv4) {
      return (
        address instanceof ipaddr.IPv4 &&
        address.match(network, this.prefixLength)
      );
    }
    return (
      address instanceof ipaddr.IPv6 &&
      address.match(network, this.prefixLength)
    );
  }

  equals(other: NetworkEntry): boolean {
    return this.toString() === other.toString();
  }

  toString(): string {
    return `${this.address.toString()}/${this.prefixLength}`;
  }
}

// unlike parseAddress, keeps IPv4-mapped IPv6 literals as IPv6
function parseAddressLiteral(text: string): IpAddress | undefined {
  if (text.includes(":")) {
    return ipaddr.IPv6.isValid(text) ? ipaddr.IPv6.parse(text) : undefined;
  }
  if (!ipv4Pattern.test(text) || !ipaddr.IPv4.isValid(text)) {
    return undefined;
  }
  return ipaddr.IPv4.parse(text);
}

function mask(address: IpAddress, prefixLength: number): IpAddress {
  const bytes = address.toByteArray();
  for (let i = 0; i < bytes.length; i++) {
    const keep = Math.min(Math.max(prefixLength - i * 8, 0), 8);
    bytes[i] &= (0xff << (8 - keep)) & 0xff;
  }
  return ipaddr.fromByteArray(bytes);
}
