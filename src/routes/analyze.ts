/**
 * Natural language analysis endpoints.
 */

import type { FastifyInstance } from 'fastify';
import { createAnalyzeRequestSchema } from '../types/models.js';
import type { Analyzer } from '../services/analyzer.js';
import { parseBody } from './parse.js';

export interface AnalyzeRouteOptions {
  analyzer: Analyzer;
  maxPromptLength: number;
}

export async function analyzeRoutes(fastify: FastifyInstance, options: AnalyzeRouteOptions) {
  const { analyzer, maxPromptLength } = options;
  const AnalyzeRequestSchema = createAnalyzeRequestSchema(maxPromptLength);

  // POST /analyze - question → SQL → rows → insight
  fastify.post(
    '/analyze',
    {
      schema: {
        description: 'Answer a natural language question against a database',
        tags: ['Analyze'],
      },
    },
    async (request) => {
      const body = parseBody(AnalyzeRequestSchema, request.body);
      return analyzer.analyze(body);
    }
  );

  // POST /generate_sql - SQL only, nothing is executed
  fastify.post(
    '/generate_sql',
    {
      schema: {
        description: 'Generate and sanitize SQL without executing it',
        tags: ['Analyze'],
      },
    },
    async (request) => {
      const body = parseBody(AnalyzeRequestSchema, request.body);
      const { database, sql } = await analyzer.generateSql(body);
      return { database, sql };
    }
  );
}
