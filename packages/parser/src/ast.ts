export interface ReferenceSegment {
  name: string;
  index?: AttributeValue; // e.g. `public[0]` or `cidrs[count.index]`
}

export type AttributeValue =
  | { type: 'String'; value: string }
  | { type: 'Number'; value: number }
  | { type: 'Boolean'; value: boolean }
  | { type: 'List'; value: AttributeValue[] }
  | { type: 'Map'; value: Record<string, AttributeValue> }
  | { type: 'Reference'; value: ReferenceSegment[] }; // e.g., aws_vpc.main.id

export interface ResourceBlock {
  type: 'Resource';
  resourceType: string; // e.g., "aws_subnet"
  name: string; // e.g., "public"
  attributes: Record<string, AttributeValue>;
  line: number;
}

export interface VariableBlock {
  type: 'Variable';
  name: string; // e.g., "environment"
  attributes: Record<string, AttributeValue>; // default, description
  line: number;
}

export interface OutputBlock {
  type: 'Output';
  name: string;
  value: AttributeValue;
  line: number;
}

export type Statement = ResourceBlock | VariableBlock | OutputBlock;
export type Program = Statement[];

/** `name = value` line of a values file */
export interface Assignment {
  name: string;
  value: AttributeValue;
  line: number;
}
