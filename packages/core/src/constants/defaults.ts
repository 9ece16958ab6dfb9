/**
 * Default values for the DNS HA stack.
 *
 * Container names, ports and timeouts match the docker-compose layout of
 * a Pi-hole + Unbound pair.
 */

// Gateway timeouts
export const DEFAULT_MUTATION_TIMEOUT_MS = 10_000;
export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;
export const DEFAULT_CONNECTIVITY_TIMEOUT_MS = 5_000;
export const DEFAULT_REBUILD_TIMEOUT_MS = 300_000;

// Instances
export const DEFAULT_PRIMARY_CONTAINER = "pihole_primary";
export const DEFAULT_PIHOLE_PRIMARY_IP = "192.168.8.251";
export const DEFAULT_PIHOLE_SECONDARY_IP = "192.168.8.252";
export const DEFAULT_DNS_PORT = 53;
export const DEFAULT_UNBOUND_PORT = 5335;

// Health
export const DEFAULT_HEALTH_TEST_DOMAIN = "google.com";
export const DEFAULT_HEALTH_PORT = 8888;
export const DEFAULT_WATCHDOG_FAIL_THRESHOLD = 2;
export const DEFAULT_MAX_RESTART_ATTEMPTS = 3;
export const DEFAULT_RESTART_COOLDOWN_MS = 300_000;

// Roles
export const FILTER_ROLE = "filter";
export const RESOLVER_ROLE = "resolver";
