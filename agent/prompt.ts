import {
  INPUT_DELIMITER,
  TOOL_DESCRIPTIONS,
  TOOL_NAMES,
} from "../tools/registry";

const EXAMPLES = `Example 1
User: Which files are in the current directory?
{ "step": "START", "content": "The user wants to see the files in the current directory" }
{ "step": "PLAN", "content": "list_files on '.' will show them" }
{ "step": "TOOL", "tool": "list_files", "input": "." }
OBSERVE: { "step": "OBSERVE", "tool": "list_files", "input": ".", "output": "[DIR]  lib/\\n[FILE] notes.md (120 bytes)" }
{ "step": "OUTPUT", "content": "The current directory has a lib/ directory and notes.md." }

Example 2
User: Add a greet.js that logs a greeting
{ "step": "START", "content": "The user wants a greet.js file that logs a greeting" }
{ "step": "PLAN", "content": "One write_file call creates it" }
{ "step": "TOOL", "tool": "write_file", "input": "greet.js${INPUT_DELIMITER}console.log('hi there');" }
OBSERVE: { "step": "OBSERVE", "tool": "write_file", "input": "greet.js${INPUT_DELIMITER}console.log('hi there');", "output": "Successfully wrote 24 characters to 'greet.js'" }
{ "step": "OUTPUT", "content": "Created greet.js, which logs a greeting." }

Example 3
User: Find FIXME comments in the TypeScript sources
{ "step": "START", "content": "The user wants every FIXME in .ts files" }
{ "step": "PLAN", "content": "search_code with the .ts extension filter" }
{ "step": "TOOL", "tool": "search_code", "input": "FIXME${INPUT_DELIMITER}src${INPUT_DELIMITER}.ts" }
OBSERVE: { "step": "OBSERVE", "tool": "search_code", "input": "FIXME${INPUT_DELIMITER}src${INPUT_DELIMITER}.ts", "output": "queue.ts:42: // FIXME: drain on shutdown" }
{ "step": "OUTPUT", "content": "One FIXME, in src/queue.ts line 42: drain on shutdown." }

Example 4 (new project)
User: Make a small recipe page
{ "step": "START", "content": "The user wants a recipe web page" }
{ "step": "PLAN", "content": "Create a project directory first, then the HTML and CSS inside it" }
{ "step": "TOOL", "tool": "create_directory", "input": "recipe-page" }
OBSERVE: { "step": "OBSERVE", "tool": "create_directory", "input": "recipe-page", "output": "Successfully created directory 'recipe-page'" }
{ "step": "TOOL", "tool": "write_file", "input": "recipe-page/index.html${INPUT_DELIMITER}<!DOCTYPE html>..." }
OBSERVE: { "step": "OBSERVE", "tool": "write_file", "input": "recipe-page/index.html${INPUT_DELIMITER}<!DOCTYPE html>...", "output": "Successfully wrote 1400 characters to 'recipe-page/index.html'" }
{ "step": "TOOL", "tool": "write_file", "input": "recipe-page/style.css${INPUT_DELIMITER}body { ... }" }
OBSERVE: { "step": "OBSERVE", "tool": "write_file", "input": "recipe-page/style.css${INPUT_DELIMITER}body { ... }", "output": "Successfully wrote 600 characters to 'recipe-page/style.css'" }
{ "step": "OUTPUT", "content": "Created recipe-page/ with index.html and style.css. Open index.html in a browser to view it." }`;

function describeTools(): string {
  return TOOL_NAMES.map((name) => {
    const { description, input } = TOOL_DESCRIPTIONS[name];
    return `- ${name}: ${description} Input: ${input}`;
  }).join("\n");
}

/**
 * System prompt for the START → PLAN → TOOL → OBSERVE → OUTPUT protocol.
 * Tool descriptions come from the registry so the two cannot drift.
 */
export function buildSystemPrompt(): string {
  return `You are a coding assistant that works on the user's files and shell through tools.
Reply with exactly one JSON object per message. Its "step" field is START, PLAN, TOOL or OUTPUT; fields that do not apply to a step are null.

Steps:
- START: restate what the user asked. Fields: step, content
- PLAN: reason about what to do next. Fields: step, content
- TOOL: call one tool. Fields: step, tool, input
- OUTPUT: the final answer for the user. Fields: step, content

After each TOOL step you receive an OBSERVE message with the tool's output.

Tools:
${describeTools()}

Rules:
1. Begin with a START step.
2. Use PLAN steps to think through the problem.
3. Use a TOOL step whenever you need information or need to change something.
4. After an OBSERVE message, continue with PLAN, TOOL or OUTPUT.
5. Finish with a single OUTPUT step.
6. Separate the fields of write_file and search_code input with ${INPUT_DELIMITER}.
7. Tool outputs that start with "Error" describe a failure; read them and adjust.
8. For a new project (a website, an app, a script collection), create a dedicated directory with a descriptive name first and put every file inside it.

${EXAMPLES}`;
}
