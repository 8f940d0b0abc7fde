import { z } from "zod";
import { CHARSET_NAMES } from "../generators/bruteForce.js";

/**
 * Zod schema definitions for the JSON API.
 * These schemas provide runtime validation and type inference.
 */

export const ATTACK_METHODS = ["dictionary", "rule_based", "brute_force", "ai"] as const;

export type AttackMethod = (typeof ATTACK_METHODS)[number];

export const DEVICE_TYPES = [
  "flash_drive",
  "external_hdd",
  "usb_ssd",
  "encrypted_device",
  "smart_card",
] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

export const SECURITY_LEVELS = ["basic", "standard", "advanced", "military"] as const;

export type SecurityLevel = (typeof SECURITY_LEVELS)[number];

/**
 * Body of an attack request. Digest format and length bounds are checked by
 * the orchestrator so they can be classified separately.
 */
export const AttackRequestSchema = z.object({
  targetDigest: z.string().describe("SHA-256 digest to attack, as hex"),
  method: z.enum(ATTACK_METHODS).default("dictionary").describe("Candidate source"),
  maxLength: z.number().optional().describe("Longest brute-force candidate"),
  charset: z.enum(CHARSET_NAMES).optional().describe("Brute-force alphabet"),
  context: z.string().max(500).optional().describe("Free-text hints for the AI advisor"),
});

export type AttackRequest = z.infer<typeof AttackRequestSchema>;

export const GenerateHashRequestSchema = z.object({
  plaintext: z.string().trim().min(1, "Plaintext is required").describe("Text to hash"),
});

export type GenerateHashRequest = z.infer<typeof GenerateHashRequestSchema>;

export const ValidateHashRequestSchema = z.object({
  digest: z.string().min(1, "Digest is required").describe("Digest to check"),
});

export type ValidateHashRequest = z.infer<typeof ValidateHashRequestSchema>;

export const CreateDeviceRequestSchema = z.object({
  deviceType: z.enum(DEVICE_TYPES).describe("Kind of simulated device"),
  securityLevel: z.enum(SECURITY_LEVELS).describe("Determines how many attempts are allowed"),
  code: z.string().trim().min(1).max(128).optional().describe("Unlock code; random when omitted"),
});

export type CreateDeviceRequest = z.infer<typeof CreateDeviceRequestSchema>;

export const UnlockRequestSchema = z.object({
  plaintext: z.string().min(1, "Plaintext is required").max(128).describe("Code to try"),
  method: z.string().trim().min(1).max(32).default("manual").describe("Label for statistics"),
});

export type UnlockRequest = z.infer<typeof UnlockRequestSchema>;

export const DeviceParamsSchema = z.object({
  id: z.string().min(1).describe("Device identifier"),
});

export type DeviceParams = z.infer<typeof DeviceParamsSchema>;
