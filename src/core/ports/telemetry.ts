export type TelemetryEvent =
  | {
      type: 'server_started'
      payload: { host: string; port: number; appResources: string; staticResources: string }
    }
  | {
      type: 'server_stopped'
      payload: { host: string; port: number }
    }
  | {
      type: 'request_served'
      payload: { method: string; path: string; status: number; durationMs: number }
    }

export interface TelemetrySink {
  emit(event: TelemetryEvent): void
}

export class NoopTelemetrySink implements TelemetrySink {
  emit(_event: TelemetryEvent): void {}
}

export class ConsoleTelemetrySink implements TelemetrySink {
  emit(event: TelemetryEvent): void {
    console.log(JSON.stringify({ ts: Date.now(), ...event }))
  }
}
