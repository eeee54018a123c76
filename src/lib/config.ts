export const SERVICE_NAME = "rundeck-effect-client"

/** Highest API version this client speaks. */
export const RUNDECK_API_VERSION = 11

export const DEFAULT_SERVER = "localhost"
export const DEFAULT_PROTOCOL = "http"
export const DEFAULT_PORT = 4440

export const JOB_RUN_TIMEOUT = "60 seconds"
export const JOB_RUN_INTERVAL = "3 seconds"

export const HEADERS = {
  AUTH_TOKEN: "X-Rundeck-Auth-Token",
  // servers >= 11 drop the <result> wrapper unless asked for it
  XML_RESPONSE_WRAPPER: "X-Rundeck-API-XML-Response-Wrapper",
} as const

export const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  http: 80,
  https: 443,
}
