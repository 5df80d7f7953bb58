import type {} from "fastify";
import type { AdmissionRouteConfig } from "../plugins/admission.js";

declare module "fastify" {
  interface FastifyRequest {
    correlationId: string;
  }

  interface FastifyContextConfig {
    rateLimit?: AdmissionRouteConfig;
  }
}
