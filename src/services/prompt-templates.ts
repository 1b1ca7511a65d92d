// Structured prompt templates for each LLM operation

export const PROMPT_TEMPLATES = {
  AGENT_SYSTEM: `You are the {{role}}.

GOAL:
{{goal}}

BACKSTORY:
{{backstory}}`,

  TASK: `TASK:
{{description}}

EXPECTED OUTPUT:
{{expectedOutput}}

CONTEXT FROM PREVIOUS STEPS:
{{context}}`,

  EMAIL_OUTPUT_FORMAT: `Return ONLY a JSON object with this structure, no additional text:
{
  "subjectLine": "the email subject line",
  "emailBody": "the full email body, paragraphs separated by blank lines",
  "followUpNotes": "notes for the sales person",
  "validatedTitle": "job title, or null unless confirmed with high confidence",
  "validatedLinkedinProfile": "profile URL, or null unless confirmed with high confidence",
  "validatedCountry": "country, or null unless confirmed with high confidence"
}`,

  RETRY_GUIDANCE: `RETRY GUIDANCE (attempt {{attempt}}):
The previous draft did not meet the quality bar. Address the following:
{{enhancements}}`,

  ANALYZE_FAILURES_SYSTEM:
    'You analyze failures in a multi-agent sales email generation system and answer in the exact section format requested.',

  ANALYZE_FAILURES: `You are analyzing failures in a multi-agent sales email generation system.

FAILURE PATTERNS IDENTIFIED:
{{patterns}}

EXAMPLE FAILURES:
{{examples}}

CURRENT AGENT PROMPTS (agents.yaml):
\`\`\`yaml
{{agentsYaml}}
\`\`\`

CURRENT TASK DESCRIPTIONS (tasks.yaml):
\`\`\`yaml
{{tasksYaml}}
\`\`\`

Please analyze these failures and provide:

1. AGENT WEAKNESSES: Which agent prompts are unclear, missing instructions, or contradictory?
2. TASK WEAKNESSES: Which task descriptions need strengthening or clarification?
3. PRIORITY FIXES: The top 5 most important changes to make, as a numbered list.
4. SUMMARY: A brief 2-3 sentence summary of root causes and the recommended approach.

Format your response exactly as:

AGENT WEAKNESSES:
linkedin_researcher: [weakness1, weakness2]
prospect_researcher: [weakness1]

TASK WEAKNESSES:
linkedin_research_task: [weakness1, weakness2]

PRIORITY FIXES:
1. Fix1
2. Fix2

SUMMARY:
Your summary here.`,

  IMPROVE_PROMPTS_SYSTEM:
    'You improve AI agent prompts based on failure analysis and answer in the exact IMPROVEMENT block format requested.',

  IMPROVE_PROMPTS: `You are improving AI agent prompts based on failure analysis.

FAILURE ANALYSIS:
{{summary}}

FAILURE PATTERNS:
{{patterns}}

PRIORITY FIXES NEEDED:
{{priorityFixes}}

EXAMPLE FAILURES:
{{examples}}

CURRENT AGENTS: {{agentNames}}
CURRENT TASKS: {{taskNames}}

Generate specific prompt improvements to address these failures. For each improvement name the agent or task,
the field to replace (backstory, goal, description, expected_output), the complete improved text, and the rationale.

Guidelines:
- Address root causes, not symptoms
- Preserve existing good functionality
- Strengthen critical requirements with "CRITICAL:" or "MANDATORY:"
- For intent compliance issues, add explicit selling_intent enforcement
- For personalization issues, strengthen research requirements
- For CTA issues, add CTA examples and requirements

FORMAT YOUR RESPONSE AS:

IMPROVEMENT 1:
Target: agent | task
Name: agent_name or task_name
Field: backstory | goal | description | expected_output
Improved Text:
\`\`\`
Your improved text here (can be multiple lines)
\`\`\`
Rationale: Why this change addresses the failure

IMPROVEMENT 2:
...

SUMMARY:
Brief summary of improvements and expected impact.

EXPECTED IMPACT:
Predicted improvement in pass rate and specific metrics.`,
} as const;
