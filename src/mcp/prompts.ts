// This module defines the prompt templates offered through prompts/list and prompts/get.

import type { McpPrompt, McpPromptMessage } from '../types/mcp.js';
import { AppError, InvalidArgumentsError } from '../utils/errors.js';

export interface PromptResult {
  description: string;
  messages: McpPromptMessage[];
}

interface PromptDefinition extends McpPrompt {
  render(args: Record<string, string>): PromptResult;
}

function userMessage(instruction: string, request: string): McpPromptMessage {
  return {
    role: 'user',
    content: { type: 'text', text: `${instruction}\n\n${request}` }
  };
}

const PROMPTS: readonly PromptDefinition[] = [
  {
    name: 'api_data_analysis',
    description: 'Analyze data retrieved from the external API',
    arguments: [
      { name: 'data', description: 'Data to analyze', required: true },
      { name: 'focus', description: 'Analysis focus area', required: false }
    ],
    render: (args) => {
      const focus = args.focus ?? 'general insights';
      return {
        description: 'Analyze API data and provide insights',
        messages: [
          userMessage(
            'You are a data analyst. Analyze the provided API data and provide actionable insights with focus on the specified area.',
            `Please analyze this API data with focus on ${focus}:\n\n${args.data}\n\nProvide key insights, patterns, and recommendations.`
          )
        ]
      };
    }
  },
  {
    name: 'generate_report',
    description: 'Generate a report based on processed data',
    arguments: [
      { name: 'data', description: 'Processed data', required: true },
      { name: 'report_type', description: 'Type of report', required: false }
    ],
    render: (args) => {
      const reportType = args.report_type ?? 'summary';
      return {
        description: 'Generate a comprehensive report',
        messages: [
          userMessage(
            `You are a report generator. Create a detailed ${reportType} report based on the provided data.`,
            `Generate a ${reportType} report based on this data:\n\n${args.data}\n\nInclude executive summary, key findings, and recommendations.`
          )
        ]
      };
    }
  },
  {
    name: 'error_analysis',
    description: 'Analyze and provide solutions for errors',
    arguments: [{ name: 'error_details', description: 'Error information', required: true }],
    render: (args) => ({
      description: 'Analyze errors and provide solutions',
      messages: [
        userMessage(
          'You are a technical troubleshooter. Analyze the error details and provide practical solutions.',
          `Analyze this error and provide solutions:\n\n${args.error_details}\n\nInclude root cause analysis and step-by-step resolution.`
        )
      ]
    })
  }
];

// Non-string argument values are passed to the template as JSON text.
function toPromptArguments(raw: Record<string, unknown>): Record<string, string> {
  const args: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null) {
      continue;
    }
    args[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return args;
}

export class PromptCatalog {
  public list(): McpPrompt[] {
    return PROMPTS.map(({ name, description, arguments: promptArguments }) => ({
      name,
      description,
      arguments: promptArguments.map((argument) => ({ ...argument }))
    }));
  }

  public get(name: string, rawArguments: Record<string, unknown>): PromptResult {
    const prompt = PROMPTS.find((candidate) => candidate.name === name);
    if (!prompt) {
      throw new AppError(404, 'unknown_prompt', `Unknown prompt: ${name}`);
    }

    const args = toPromptArguments(rawArguments);
    const missing = prompt.arguments
      .filter((argument) => argument.required && !args[argument.name])
      .map((argument) => argument.name);
    if (missing.length > 0) {
      throw new InvalidArgumentsError(`Missing required arguments for prompt ${name}: ${missing.join(', ')}`);
    }

    return prompt.render(args);
  }
}
