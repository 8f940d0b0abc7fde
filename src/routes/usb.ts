import type { FastifyInstance } from "fastify";
import type { Logger } from "pino";
import {
  CreateDeviceRequestSchema,
  DeviceParamsSchema,
  UnlockRequestSchema,
} from "../shared/types.js";
import type { UsbSimulator } from "../usbSimulator.js";

export interface UsbRoutesDependencies {
  simulator: UsbSimulator;
  log: Logger;
}

/**
 * Register simulated USB device routes.
 */
export function registerUsbRoutes(app: FastifyInstance, deps: UsbRoutesDependencies): void {
  const { simulator, log } = deps;

  app.get("/api/usb/devices", async (_request, reply) => {
    return reply.send({ devices: simulator.list() });
  });

  app.post("/api/usb/devices", async (request, reply) => {
    const { deviceType, securityLevel, code } = CreateDeviceRequestSchema.parse(request.body);
    const device = simulator.create(deviceType, securityLevel, code);
    return reply.status(201).send(device);
  });

  /**
   * POST /api/usb/quick-setup
   * Create the demo device set.
   */
  app.post("/api/usb/quick-setup", async (_request, reply) => {
    const devices = simulator.quickSetup();
    log.info({ count: devices.length }, "Quick setup completed");
    return reply.status(201).send({ devices });
  });

  app.get("/api/usb/devices/:id", async (request, reply) => {
    const { id } = DeviceParamsSchema.parse(request.params);
    return reply.send(simulator.detect(id));
  });

  /**
   * POST /api/usb/devices/:id/unlock
   * Try one code. A wrong code is a normal outcome, not an error status.
   */
  app.post("/api/usb/devices/:id/unlock", async (request, reply) => {
    const { id } = DeviceParamsSchema.parse(request.params);
    const { plaintext, method } = UnlockRequestSchema.parse(request.body);
    return reply.send(await simulator.unlock(id, plaintext, method));
  });

  app.post("/api/usb/devices/:id/reset", async (request, reply) => {
    const { id } = DeviceParamsSchema.parse(request.params);
    const device = await simulator.reset(id);
    return reply.send({ reset: true, device });
  });

  app.get("/api/usb/statistics", async (_request, reply) => {
    return reply.send(simulator.statistics());
  });
}
