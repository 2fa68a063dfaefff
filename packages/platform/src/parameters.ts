import type { LocalEndpoint } from './endpoint'
import type { ProtocolOptions } from './protocol-options'

export enum MultipathServiceType {
  Disabled = 'disabled',
  Handover = 'handover',
  Interactive = 'interactive',
  Aggregate = 'aggregate',
}

export interface ServiceAdvertisement {
  readonly name: string
  readonly type: string
  readonly domain: string
}

/**
 * Everything a platform needs to build a listener. Built fresh for each
 * activation and handed to the user configurator before construction, so
 * every field but the protocol is writable.
 */
export interface ListenerParameters {
  readonly protocol: ProtocolOptions
  requiredLocalEndpoint?: LocalEndpoint
  requiredInterface?: string
  allowLocalEndpointReuse: boolean
  includePeerToPeer: boolean
  multipathServiceType: MultipathServiceType
}

export type ParametersConfigurator = (parameters: ListenerParameters) => void

export function createListenerParameters(
  protocol: ProtocolOptions,
): ListenerParameters {
  return {
    protocol,
    allowLocalEndpointReuse: false,
    includePeerToPeer: false,
    multipathServiceType: MultipathServiceType.Disabled,
  }
}
