import type { EventRecord, ProgressIndex, RunState } from "etl-core";

export interface MonitorResponse {
  statusCode: number;
  payload: unknown;
}

function parseLimit(raw: string | null): number | undefined | null {
  if (raw === null) {
    return undefined;
  }

  if (!/^\d+$/.test(raw.trim())) {
    return null;
  }

  return Number.parseInt(raw, 10);
}

export function listIndices(state: RunState): ProgressIndex[] {
  return state.progress.snapshot().map((index) => ({
    name: index.name,
    current: index.current,
    final: index.final
  }));
}

export function listEvents(state: RunState, limit?: number): EventRecord[] {
  return state.events.recent(limit).map((record) => ({
    target: record.target,
    step: record.step,
    event: record.event,
    timestamp: record.timestamp,
    elapsed: record.elapsed
  }));
}

export function handleMonitorRequest(
  state: RunState,
  method: string,
  url: URL
): MonitorResponse {
  if (method !== "GET") {
    return { statusCode: 405, payload: { error: "Method Not Allowed" } };
  }

  switch (url.pathname) {
    case "/health":
      return {
        statusCode: 200,
        payload: { status: "ok", complete: state.progress.allComplete() }
      };
    case "/api/etl-id":
      return { statusCode: 200, payload: { id: state.etlId } };
    case "/api/indices":
      return { statusCode: 200, payload: listIndices(state) };
    case "/api/events": {
      const limit = parseLimit(url.searchParams.get("limit"));
      if (limit === null) {
        return {
          statusCode: 400,
          payload: { error: "Invalid limit", message: "limit must be a non-negative integer" }
        };
      }
      return { statusCode: 200, payload: listEvents(state, limit) };
    }
    default:
      return { statusCode: 404, payload: { error: "Not Found" } };
  }
}
