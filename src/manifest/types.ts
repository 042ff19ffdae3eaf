export interface StepDecl {
  name: string;
  kind: string;
  /** Steps this one depends on (the reserved `needs` property). */
  needs: string[];
  properties: Record<string, unknown>;
}

export interface Manifest {
  id: string;
  purpose: string;
  tag: string;
  /** Explicit order from @graph; empty when the order comes from `needs`. */
  graph: string[];
  steps: Map<string, StepDecl>;
}
