/**
 * Jest setup file for API tests
 */
import "reflect-metadata";
import * as path from "path";

process.env.NODE_ENV = "test";
process.env.PROFILES_DIR = path.resolve(__dirname, "../profiles");
process.env.PIHOLE_PRIMARY_IP = "10.0.0.1";
process.env.PIHOLE_SECONDARY_IP = "10.0.0.2";
process.env.HEALTH_TEST_DOMAIN = "example.test";
process.env.WATCHDOG_ENABLED = "false";

jest.setTimeout(10000);
