import type { SimulationReport } from '../types.js';

function esc(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function line(name: string, labels: Record<string, string>, value: number): string {
  const labelText = Object.entries(labels)
    .map(([k, v]) => `${k}="${esc(v)}"`)
    .join(',');
  return `${name}{${labelText}} ${value}`;
}

function metricMeta(name: string, type: 'gauge' | 'counter', help: string): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

// Statistics that are undefined for a flow (nothing received yet) are left out rather than zeroed.
function optionalLine(name: string, labels: Record<string, string>, value: number | null): string[] {
  return value === null || !Number.isFinite(value) ? [] : [line(name, labels, value)];
}

export function toPrometheusText(report: SimulationReport): string {
  const out: string[] = [];
  const classByFlow = new Map<string, string>();
  for (const payload of report.payloads) {
    if (payload.flowId && payload.classId) classByFlow.set(payload.flowId, payload.classId);
  }

  const run = { run_id: report.runId, scenario: report.scenario ?? '' };

  out.push(...metricMeta('sim_flow_fragments_sent', 'gauge', 'Fragments handed to the transport per flow.'));
  out.push(...metricMeta('sim_flow_fragments_received', 'gauge', 'Fragments received per flow.'));
  out.push(...metricMeta('sim_flow_bytes_received', 'gauge', 'Payload bytes received per flow.'));
  out.push(...metricMeta('sim_flow_mean_delay_seconds', 'gauge', 'Mean per-fragment delay per flow in seconds.'));
  out.push(...metricMeta('sim_flow_throughput_bps', 'gauge', 'Achieved throughput per flow in bits/second.'));
  out.push(...metricMeta('sim_flow_loss_ratio', 'gauge', 'Share of sent fragments never received, between 0 and 1.'));

  for (const flow of report.flows) {
    const labels = { ...run, flow: flow.flowId, class: classByFlow.get(flow.flowId) ?? '' };
    out.push(line('sim_flow_fragments_sent', labels, flow.sent));
    out.push(line('sim_flow_fragments_received', labels, flow.received));
    out.push(line('sim_flow_bytes_received', labels, flow.bytesReceived));
    out.push(...optionalLine('sim_flow_mean_delay_seconds', labels, flow.meanDelaySec));
    out.push(...optionalLine('sim_flow_throughput_bps', labels, flow.throughputBps));
    out.push(line('sim_flow_loss_ratio', labels, flow.lossRatio));
  }

  out.push(...metricMeta('sim_class_assigned_total', 'counter', 'Payloads bound to each destination class.'));
  out.push(...metricMeta('sim_class_mean_delay_seconds', 'gauge', 'Unweighted mean of flow delays per class.'));
  out.push(...metricMeta('sim_class_throughput_bps', 'gauge', 'Unweighted mean of flow throughput per class.'));
  out.push(...metricMeta('sim_class_loss_ratio', 'gauge', 'Unweighted mean of flow loss ratios per class.'));

  for (const stats of report.classes) {
    const labels = { ...run, class: stats.classId };
    out.push(line('sim_class_assigned_total', labels, report.assigned[stats.classId] ?? 0));
    out.push(...optionalLine('sim_class_mean_delay_seconds', labels, stats.meanDelaySec));
    out.push(...optionalLine('sim_class_throughput_bps', labels, stats.throughputBps));
    out.push(...optionalLine('sim_class_loss_ratio', labels, stats.lossRatio));
  }

  out.push(...metricMeta('sim_dropped_payloads_total', 'counter', 'Payloads dropped for want of a fallback class.'));
  out.push(line('sim_dropped_payloads_total', run, report.droppedPayloads));
  out.push(...metricMeta('sim_stats_inconsistencies_total', 'counter', 'Receive events with no matching send.'));
  out.push(line('sim_stats_inconsistencies_total', run, report.inconsistencies.length));

  return `${out.join('\n')}\n`;
}
