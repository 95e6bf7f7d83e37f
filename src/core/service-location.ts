import { ConfigError } from "./errors.js";

export const SERVICE_LOCATIONS = {
  prod: "https://api.materialsdatafacility.org",
  dev: "https://f6avec0img.execute-api.us-east-1.amazonaws.com/test",
} as const;

export type ServiceInstance = keyof typeof SERVICE_LOCATIONS;

export const ROUTES = {
  submit: "/submit",
  status: "/status/",
  allStatus: "/submissions/",
  curation: "/curate/",
  allCuration: "/curation/",
  metadataUpdate: "/update/",
} as const;

/** `prod`/`production` (or unset) and `dev`/`development` */
export function resolveServiceInstance(name: string | undefined): ServiceInstance {
  if (name === undefined || name === "prod" || name === "production") return "prod";
  if (name === "dev" || name === "development") return "dev";
  throw new ConfigError(`'serviceInstance' must be 'prod' or 'dev', not '${name}'`);
}
