import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  type CounterConfiguration,
  type GaugeConfiguration,
  type HistogramConfiguration,
} from 'prom-client'

export type LabelsGeneric = Record<string, string | number>
export type LabelKeys<Labels extends LabelsGeneric> = Extract<keyof Labels, string>

type MetricConfig<Labels extends LabelsGeneric> = {
  name: string
  help: string
  labelNames?: readonly LabelKeys<Labels>[]
}

export type StaticConfig = {
  name: string
  help: string
  value: Record<string, string>
}

/**
 * prom-client Registry that creates metrics already bound to itself, so
 * callers never touch the global default registry.
 */
export class RegistryMetricCreator extends Registry {
  gauge<Labels extends LabelsGeneric = LabelsGeneric>(
    config: MetricConfig<Labels> &
      Pick<GaugeConfiguration<LabelKeys<Labels>>, 'collect'>,
  ): Gauge<LabelKeys<Labels>> {
    return new Gauge<LabelKeys<Labels>>({
      ...config,
      labelNames: config.labelNames ?? [],
      registers: [this],
    })
  }

  counter<Labels extends LabelsGeneric = LabelsGeneric>(
    config: MetricConfig<Labels>,
  ): Counter<LabelKeys<Labels>> {
    return new Counter<LabelKeys<Labels>>({
      ...config,
      labelNames: config.labelNames ?? [],
      registers: [this],
    } satisfies CounterConfiguration<LabelKeys<Labels>>)
  }

  histogram<Labels extends LabelsGeneric = LabelsGeneric>(
    config: MetricConfig<Labels> &
      Pick<HistogramConfiguration<LabelKeys<Labels>>, 'buckets'>,
  ): Histogram<LabelKeys<Labels>> {
    return new Histogram<LabelKeys<Labels>>({
      ...config,
      labelNames: config.labelNames ?? [],
      registers: [this],
    })
  }

  /** Gauge fixed at 1 whose labels carry the information */
  static({ name, help, value }: StaticConfig): void {
    const gauge = this.gauge<Record<string, string>>({
      name,
      help,
      labelNames: Object.keys(value),
    })
    gauge.set(value, 1)
  }
}
