export { createHealthController, type HealthController, type HealthReport } from "./health.ts";
export {
  createLinksController,
  identifierFromPath,
  type LinksController,
  normalizeUrl,
} from "./links.ts";
