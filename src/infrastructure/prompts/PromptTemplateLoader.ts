/**
 * Prompt 模板加载器
 * Reads the role instructions of every mode once, at startup.
 */

import fs from 'fs';
import path from 'path';
import { ChatMode } from '../../features/chat/domain/ChatMode.js';

export type RoleInstructions = Record<ChatMode, string>;

/**
 * 读取 prompt 模板文件
 */
export function readPromptTemplate(promptDir: string, templatePath: string): string {
    const fullPath = path.isAbsolute(templatePath)
        ? templatePath
        : path.join(promptDir, templatePath);

    if (!fs.existsSync(fullPath)) {
        throw new Error(`Prompt template not found: ${fullPath}`);
    }

    const content = fs.readFileSync(fullPath, 'utf-8').trim();
    if (!content) {
        throw new Error(`Prompt template is empty: ${fullPath}`);
    }
    return content;
}

/**
 * Loads `<mode>.md` for each mode from the prompt directory.
 */
export function loadRoleInstructions(promptDir: string): RoleInstructions {
    return {
        [ChatMode.QA]: readPromptTemplate(promptDir, `${ChatMode.QA}.md`),
        [ChatMode.NORMAL]: readPromptTemplate(promptDir, `${ChatMode.NORMAL}.md`),
    };
}
