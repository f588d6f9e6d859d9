import { resourceFromAttributes, type Resource } from '@opentelemetry/resources'
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions'
import { ATTR_DEPLOYMENT_ENVIRONMENT_NAME } from '@opentelemetry/semantic-conventions/incubating'

export interface ResourceOptions {
  serviceName: string
  serviceVersion?: string
  environment?: string
}

/**
 * Build the OTel {@link Resource} shared by the logger, meter and tracer
 * providers so every signal reports the same service identity.
 */
export function buildResource(opts: ResourceOptions): Resource {
  const instanceId = process.env.OTEL_SERVICE_INSTANCE_ID ?? process.env.HOSTNAME
  return resourceFromAttributes({
    [ATTR_SERVICE_NAME]: process.env.OTEL_SERVICE_NAME ?? opts.serviceName,
    [ATTR_SERVICE_VERSION]: opts.serviceVersion ?? '0.0.0',
    [ATTR_DEPLOYMENT_ENVIRONMENT_NAME]: opts.environment ?? 'development',
    ...(instanceId ? { 'service.instance.id': instanceId } : {}),
  })
}
