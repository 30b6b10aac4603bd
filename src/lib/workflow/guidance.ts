import { readFileSync } from 'node:fs';

import { isRecord, type JsonRecord } from '../session/json-value.js';

export interface WorkflowGuidance {
    systemInfo: JsonRecord;
    workflowGuidance: JsonRecord;
}

const DEFAULT_PATH = new URL('../../../config/workflow-guidance.json', import.meta.url);

/**
 * Read the guidance returned by `/tools` and `/tools-schema`
 */
export function loadWorkflowGuidance(path: string | URL = DEFAULT_PATH): WorkflowGuidance {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));

    if (!isRecord(parsed) || !isRecord(parsed.system_info) || !isRecord(parsed.workflow_guidance)) {
        throw new Error(`Invalid workflow guidance file: ${String(path)}`);
    }

    return {
        systemInfo: parsed.system_info,
        workflowGuidance: parsed.workflow_guidance,
    };
}
