function str(v: string | undefined): string | undefined {
  const trimmed = v?.trim()
  return trimmed ? trimmed : undefined
}

export const config = {
  log: {
    level: str(process.env.LOG_LEVEL) ?? "info",
  },

  shard: {
    /** Explicit default shard id for generators that are not given one. */
    id: str(process.env.MICROSHARD_SHARD_ID),
    /** Kubernetes pod IP, injected through the Downward API. */
    podIp: str(process.env.POD_IP),
    /** Container / host name; unique per container in Docker and ECS. */
    hostname: str(process.env.HOSTNAME),
  },
}

export type MicroShardConfig = typeof config
