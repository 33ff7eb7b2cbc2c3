export type SchemaType = 'string' | 'number' | 'boolean' | 'list' | 'map';

export interface ISchemaDefinition {
  type: SchemaType;
  required?: boolean;
  forceNew?: boolean; // If true, a change to this attribute forces replacement (Delete -> Create)
  computed?: boolean; // Assigned by the provider, never set in configuration
}

export interface ISchema {
  attributes: Record<string, ISchemaDefinition>;
  /** Each group must have exactly one member set (e.g. the target of a route) */
  exactlyOneOf?: string[][];
}
