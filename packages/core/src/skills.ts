/** How a skill is meant to be used by the runtime. */
export type SkillType = 'standard' | 'flow';

/** Visual shape a flowchart node was declared with. */
export type FlowNodeShape =
  | 'plain'
  | 'rect'
  | 'round'
  | 'stadium'
  | 'subroutine'
  | 'circle'
  | 'diamond';

/** Role a node plays when a flow is executed. */
export type FlowNodeKind = 'begin' | 'end' | 'decision' | 'task';

export interface FlowNode {
  readonly id: string;
  readonly label: string;
  readonly shape: FlowNodeShape;
  readonly kind: FlowNodeKind;
}

export interface FlowEdge {
  readonly from: string;
  readonly to: string;
  readonly label?: string;
}

/** Node/edge structure of a flowchart. Edges form a multigraph. */
export interface FlowGraph {
  readonly nodes: ReadonlyMap<string, FlowNode>;
  readonly edges: readonly FlowEdge[];
}

/** A parsed flowchart with its distinguished begin node. */
export interface FlowDefinition {
  readonly beginId: string;
  readonly graph: FlowGraph;
}

interface SkillBase {
  readonly name: string;
  readonly description: string;
  readonly dir: string; // absolute path to the skill directory
}

export interface StandardSkill extends SkillBase {
  readonly type: 'standard';
  readonly flow?: undefined;
}

export interface FlowSkill extends SkillBase {
  readonly type: 'flow';
  readonly flow: FlowDefinition;
}

/** A skill discovered from a directory containing a SKILL.md file. */
export type Skill = StandardSkill | FlowSkill;

/** Configuration for the skills subsystem. */
export interface SkillsConfig {
  /** Replaces the user and project tiers when set. */
  override?: string;
  enabled: string[];
  disabled: string[];
}
