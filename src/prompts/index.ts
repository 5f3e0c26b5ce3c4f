/**
 * MCP Prompts for Interview Scheduling
 */

/**
 * Prompt definition type
 */
export interface PromptDefinition {
  name: string;
  description: string;
  arguments?: Array<{
    name: string;
    description: string;
    required?: boolean;
  }>;
}

/**
 * Prompt message type
 */
export interface PromptMessage {
  role: 'user' | 'assistant';
  content: {
    type: 'text';
    text: string;
  };
}

/**
 * Prompt list
 */
export const promptDefinitions: PromptDefinition[] = [
  {
    name: 'plan-interview-loop',
    description: 'Plan a back-to-back interview loop for a candidate from interviewer availability',
    arguments: [
      {
        name: 'candidate_name',
        description: 'Candidate being interviewed',
        required: true,
      },
      {
        name: 'job_title',
        description: 'Role the candidate is interviewing for',
        required: true,
      },
      {
        name: 'durations',
        description: 'Comma-separated interviewer=minutes pairs (e.g., "alice@example.com=45, bob@example.com=30")',
        required: false,
      },
    ],
  },
];

/**
 * Prompt handler type
 */
export type PromptHandler = (args: Record<string, string | undefined>) => Promise<{
  description?: string;
  messages: PromptMessage[];
}>;

/**
 * Parse "id=minutes" pairs; malformed pairs are dropped
 */
export function parseDurationPairs(raw: string): Array<{ interviewer: string; minutes: number }> {
  return raw
    .split(',')
    .map(pair => pair.split('='))
    .flatMap(([id, minutes]) => {
      const interviewer = id?.trim() ?? '';
      const value = Number(minutes?.trim());
      if (!interviewer || !Number.isInteger(value) || value <= 0) return [];
      return [{ interviewer, minutes: value }];
    });
}

/**
 * Create prompt handlers
 */
export function createPromptHandlers(): Record<string, PromptHandler> {
  return {
    'plan-interview-loop': async (args) => {
      const candidate = args.candidate_name ?? 'the candidate';
      const jobTitle = args.job_title ?? 'the open role';
      const durations = parseDurationPairs(args.durations ?? '');

      let promptText = `Help me plan an interview loop with the following details:

**Candidate:** ${candidate}
**Role:** ${jobTitle}`;

      if (durations.length > 0) {
        promptText += '\n**Interviewers:**';
        for (const { interviewer, minutes } of durations) {
          promptText += `\n- ${interviewer}: ${minutes} minutes`;
        }
      }

      promptText += `

Please:
1. Ask me for the interviewer availability CSV (Interviewer, Name, Title, StartTime, EndTime) if I have not shared it yet
2. Summarize it with parse_availability so we can confirm everyone is included
3. Run find_interview_agendas${durations.length > 0 ? ' with the durations above' : ''} and present the earliest and latest options for each day
4. If I propose changes to an option, check them with validate_agenda before confirming

Let's start with the availability.`;

      return {
        description: `Plan interview loop: ${candidate} for ${jobTitle}`,
        messages: [
          {
            role: 'user',
            content: {
              type: 'text',
              text: promptText,
            },
          },
        ],
      };
    },
  };
}
