import type { PipelineDag } from "./graph.js";

// Graphviz rendering of one unit's DAG; dataset inputs appear as ellipses.
export function renderDot(dag: PipelineDag): string {
  const lines: string[] = [`digraph ${quote(dag.unit.id)} {`, "  rankdir=LR;"];
  const sources = new Set<string>();

  for (const instance of dag.instances) {
    lines.push(`  ${quote(instance.id)} [label=${quote(instance.stageId)}, shape=box];`);
    for (const binding of instance.inputs) {
      if (binding.source !== "dataset") continue;
      const sourceId = `${dag.unit.id}:${binding.kind}`;
      if (!sources.has(sourceId)) {
        sources.add(sourceId);
        lines.push(`  ${quote(sourceId)} [label=${quote(binding.kind)}, shape=ellipse];`);
      }
      lines.push(`  ${quote(sourceId)} -> ${quote(instance.id)};`);
    }
  }

  for (const edge of dag.edges) {
    lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)} [label=${quote(edge.kind)}];`);
  }

  lines.push("}");
  return `${lines.join("\n")}\n`;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}
