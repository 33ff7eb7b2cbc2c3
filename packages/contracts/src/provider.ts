import type { ISchema } from './schema';
import type { ResolvedAttributes } from './values';

export interface CreateResult {
  id: string;
  attributes: ResolvedAttributes;
}

/** The contract that ALL providers must implement */
export interface IProvider {
  readonly name: string;

  /** Resource types handled by this provider (e.g., ['aws_vpc', 'aws_subnet']) */
  readonly resources: string[];

  /** Returns the schema for a specific resource type */
  getSchema(type: string): Promise<ISchema>;

  create(type: string, inputs: ResolvedAttributes): Promise<CreateResult>;
  update(type: string, id: string, inputs: ResolvedAttributes): Promise<ResolvedAttributes>;
  delete(type: string, id: string): Promise<void>;
}

/**
 * Resource Handler Interface
 * Each resource type (e.g., aws_vpc, aws_lb) implements this interface
 */
export interface IResourceHandler {
  getSchema(): ISchema;

  /**
   * Create a new resource
   * @returns Provider-assigned ID and the resolved attributes, computed ones included
   */
  create(inputs: ResolvedAttributes): Promise<CreateResult>;

  update(id: string, inputs: ResolvedAttributes): Promise<ResolvedAttributes>;

  delete(id: string): Promise<void>;
}
