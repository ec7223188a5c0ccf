export function getCapabilityPrompt(capability: string, input: string): string {
  return `Capability: ${capability}

${input}

Work in the current project directory. Reply with a concise summary of what you did and what you found.`;
}
