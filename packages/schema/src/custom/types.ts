/**
 * Network endpoint as written by node traces, e.g. `3.228.174.253:6000`
 * or `[2a05:d014::1]:3001`
 */
export interface Endpoint {
  address: string
  port: number
}

export interface ConnectionId {
  localAddress: Endpoint
  remoteAddress: Endpoint
}

export interface SchemaOptions<T> {
  errorMessage?: string
  defaultValue?: T
}
