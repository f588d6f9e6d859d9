import { z } from 'zod'

/**
 * Port entry: either a single port number or a [start, end] range tuple.
 */
const PortNumberSchema = z.number().int().min(1).max(65535)

export const PortEntrySchema = z.union([
  PortNumberSchema,
  z
    .tuple([PortNumberSchema, PortNumberSchema])
    .refine(([start, end]) => start <= end, 'Start must be <= end'),
])

export type PortEntry = z.infer<typeof PortEntrySchema>

/**
 * Reserved filter names injected into listeners that this node addresses.
 */
export const FilterNamesSchema = z.object({
  listener: z.string().min(1).default('switchyard.bpf_metadata'),
  network: z.string().min(1).default('switchyard.network'),
  http: z.string().min(1).default('switchyard.l7policy'),
})

export type FilterNames = z.infer<typeof FilterNamesSchema>

/**
 * Proxy reconciliation settings.
 *
 * `portRange` is the pool leased to listeners that arrive without an address.
 * `ackTimeoutMs` bounds every batch: a barrier still waiting when it expires
 * fails the batch with a push timeout.
 */
export const ProxyConfigSchema = z
  .object({
    portRange: z.array(PortEntrySchema).min(1).default([[10000, 10999]]),
    ipv4Enabled: z.boolean().default(true),
    ipv6Enabled: z.boolean().default(false),
    enableBpfTproxy: z.boolean().default(false),
    useOriginalSourceAddress: z.boolean().default(true),
    l7LoadBalancer: z.boolean().default(false),
    ackTimeoutMs: z.number().int().positive().default(30_000),
    validateResources: z.boolean().default(true),
    xdsClusterName: z.string().min(1).default('xds-control-plane'),
    filterNames: FilterNamesSchema.default({}),
  })
  .refine((cfg) => cfg.ipv4Enabled || cfg.ipv6Enabled, 'At least one IP family must be enabled')

export type ProxyConfig = z.infer<typeof ProxyConfigSchema>

/**
 * Identity of the node running the reconciler.
 */
export const NodeConfigSchema = z.object({
  name: z.string().min(1),
  labels: z.record(z.string(), z.string()).optional(),
})

export type NodeConfig = z.infer<typeof NodeConfigSchema>

/**
 * Top-level Switchyard configuration
 */
export const SwitchyardConfigSchema = z.object({
  node: NodeConfigSchema,
  proxy: ProxyConfigSchema.default({}),
  port: z.number().default(3000),
})

export type SwitchyardConfig = z.infer<typeof SwitchyardConfigSchema>

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined
  return value === 'true' || value === '1'
}

function parseNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined
}

/**
 * Loads the default configuration from environment variables.
 *
 * Throws when `SWITCHYARD_NODE_ID` is missing or when any value fails schema
 * validation.
 */
export function loadDefaultConfig(env: NodeJS.ProcessEnv = process.env): SwitchyardConfig {
  const nodeName = env.SWITCHYARD_NODE_ID
  if (!nodeName) {
    throw new Error('SWITCHYARD_NODE_ID environment variable is required')
  }

  const portRange: unknown = env.SWITCHYARD_PORT_RANGE
    ? JSON.parse(env.SWITCHYARD_PORT_RANGE)
    : undefined

  return SwitchyardConfigSchema.parse({
    port: Number(env.PORT) || 3000,
    node: { name: nodeName },
    proxy: {
      portRange,
      ipv4Enabled: parseFlag(env.SWITCHYARD_IPV4),
      ipv6Enabled: parseFlag(env.SWITCHYARD_IPV6),
      enableBpfTproxy: parseFlag(env.SWITCHYARD_ENABLE_BPF_TPROXY),
      ackTimeoutMs: parseNumber(env.SWITCHYARD_ACK_TIMEOUT_MS),
      xdsClusterName: env.SWITCHYARD_XDS_CLUSTER || undefined,
    },
  })
}
