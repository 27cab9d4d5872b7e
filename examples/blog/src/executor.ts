/**
 * A simple in-process GraphQL executor using graphql-js.
 * In a real app this would sit behind an HTTP handler.
 */

import { graphql, type ExecutionResult, type GraphQLSchema } from "graphql";
import type { ConverterOptions } from "../../../src";
import { createBlogData, type BlogData } from "./mock-data";
import { createBlogSchema } from "./schema";

export interface BlogExecutor {
  readonly schema: GraphQLSchema;
  readonly data: BlogData;
  execute(query: string, variables?: Record<string, unknown>): Promise<ExecutionResult>;
}

export function createBlogExecutor(options: ConverterOptions = {}): BlogExecutor {
  const data = createBlogData();
  const schema = createBlogSchema(data, options);

  return {
    schema,
    data,
    /** Execute a GraphQL request against the in-memory schema */
    async execute(query, variables = {}) {
      const result = await graphql({
        schema,
        source: query,
        variableValues: variables,
      });
      if (result.errors) {
        throw new Error(result.errors.map((e) => e.message).join("\n"));
      }
      return result;
    },
  };
}
