/** `build-frontend` → `Build Frontend` */
export function titleCase(workName: string): string {
  return workName
    .split('-')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export const WORK_DOCUMENTS = ['spec.md', 'design.md', 'breakdown.md', 'progress.md'] as const;
export type WorkDocument = (typeof WORK_DOCUMENTS)[number];

export function workDocumentTemplate(doc: WorkDocument, workName: string): string {
  const title = titleCase(workName);
  switch (doc) {
    case 'spec.md':
      return `# Spec: ${title}

## Overview

[What this work sets out to do]

## Problem

[The problem being solved]

## Goals

[Concrete objectives]

## Non-Goals

[What is deliberately left out]

## User Experience

[How people will use it]

## Success Criteria

[How we know it is done]
`;
    case 'design.md':
      return `# Design: ${title}

## Architecture

[Overall approach]

## Components

[Main pieces and what each owns]

## Implementation Details

[Technical approach in detail]

## Risk Areas

[What could go wrong and how to contain it]
`;
    case 'breakdown.md':
      return `# Implementation Breakdown: ${title}

## Tasks

1. [Task 1]
2. [Task 2]
3. [Task 3]

[One task per commit, each with clear done criteria]
`;
    case 'progress.md':
      return `# Progress: ${title}

## Status: Not Started
## Assigned to:

## Checklist
- [ ] Spec review
- [ ] Initial design
- [ ] Design review
- [ ] Implementation breakdown
- [ ] Implementation
- [ ] Code review
- [ ] Testing
- [ ] Push feature branch
- [ ] Cleanup crew workspace

## Notes
`;
  }
}

export const DEFAULT_FORMULA_NAME = 'build';

export const defaultFormula = `# Feature Implementation Formula

End-to-end feature implementation with quality gates: read the spec, design
the approach, implement it, verify it with tests, and commit to the local
repository.

## Process

### Phase 1: Spec Review (read only)
1. Read the spec
2. Separate what already exists from what is new
3. List dependencies on other modules or systems
4. Flag critical gaps: missing acceptance criteria, unclear requirements,
   ambiguous edge cases

**Gate:** if critical gaps exist, write \`CLARIFICATIONS.md\` and STOP.

### Phase 2: Design
1. Survey the codebase for patterns to follow
2. Identify files to create or modify
3. Design module structure and interfaces
4. Plan the test strategy
5. Fill in \`design.md\`: files to change, new abstractions, testing approach, risks
6. **Commit:** \`git commit -am "docs: complete design phase"\`

**Gate:** review the design and revise if there are major concerns.

### Phase 3: Implementation Planning
1. Split the design into tasks in \`breakdown.md\`. Each task fits one
   session, has done criteria, is testable on its own and ends in a commit
2. Replace the checklist in \`progress.md\` with those tasks
3. **Commit:** \`git commit -am "docs: create implementation breakdown"\`

### Phase 4: Implementation
For each task:
1. Mark it in progress in \`progress.md\`
2. Work until its done criteria are met
3. Run the relevant tests
4. **Commit:** \`feat: <task description>\`
5. Tick it off in \`progress.md\`

**Gate:** tests pass before the next task starts.

### Phase 5: Review
1. Read every changed file
2. Check against the spec's acceptance criteria
3. Check test coverage
4. Look for performance, security and error handling problems
5. Write review notes in \`progress.md\`
6. **Commit:** \`git commit -am "docs: complete code review"\`

### Phase 6: Final Steps
1. Run the full test suite
2. Update documentation
3. Set the status in \`progress.md\` to "Ready for Merge"
4. **Commit:** \`git commit -am "docs: mark work ready for merge"\`

## Notes

- Commit at every phase so work can always be picked up again
- \`progress.md\` is the state tracker; keep it current
- When finished, remind the user to push the branch
  (\`git push -u origin feat/<feature-name>\`) and remove the workspace
  (\`rig crew remove <worker-name>\`)
`;

const FORMULA_MARKER = /^<!--\s*formula:\s*(.+?)\s*-->/;

/** Formula recorded on a hook's first line, or null when absent. */
export function hookFormula(content: string): string | null {
  const match = content.match(FORMULA_MARKER);
  return match ? match[1] : null;
}

export function hookTemplate(workName: string, formula: string): string {
  const work = `work/${workName}`;
  const formulaFile = `work/formula/${formula}.md`;
  return `<!-- formula: ${formula} -->
# Hook: ${workName}

## Your Assignment

You are working on: **${workName}**

## Instructions

1. **Read the workflow formula**: ${formulaFile}
   - It defines the phases you will follow
2. **Read the spec**: ${work}/spec.md
   - It describes what you are building
3. **Follow the formula** phase by phase
   - Update ${work}/progress.md as tasks complete
   - Commit your progress after each phase

## Context Files

- Formula: ${formulaFile}
- Spec: ${work}/spec.md
- Design: ${work}/design.md
- Breakdown: ${work}/breakdown.md
- Progress: ${work}/progress.md

## Important

- Commit intermediate progress at every phase, not only at the end
- Keep progress.md up to date with your current status
- Respect the quality gates in the formula
- Ask when requirements are unclear

Start by reading the formula and the spec.
`;
}
