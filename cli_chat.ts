import * as readline from 'readline';
import config from './src/platform/config.js';
import { createAppContext } from './src/bootstrap.js';
import { ASSISTANT_LABEL, ChatMode, parseChatMode } from './src/features/chat/domain/ChatMode.js';

/**
 * Local terminal client. Talks to the chat use case directly, without the
 * HTTP layer or a login.
 */
const app = createAppContext(config);

if (app.status === 'not_ready') {
    console.error(`Missing configuration: ${app.missing.join(', ')}`);
    process.exit(1);
}

const { chatService } = app.services;
let mode: ChatMode = ChatMode.QA;

const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
});

function printHelp() {
    console.log('Commands: /mode qa|normal, /clear, /history, /help, exit');
}

async function handleLine(line: string): Promise<boolean> {
    const input = line.trim();
    if (!input) return true;
    if (input.toLowerCase() === 'exit') return false;

    if (input === '/help') {
        printHelp();
    } else if (input.startsWith('/mode')) {
        const next = parseChatMode(input.slice('/mode'.length));
        if (next) {
            mode = next;
            console.log(`Switched to ${ASSISTANT_LABEL[mode]} (${chatService.historySize(mode)} messages remembered)`);
        } else {
            console.log("Unknown mode. Use '/mode qa' or '/mode normal'.");
        }
    } else if (input === '/clear') {
        chatService.clear(mode);
        console.log('Chat cleared.');
    } else if (input === '/history') {
        for (const turn of chatService.history(mode)) {
            const speaker = turn.role === 'user' ? 'You' : ASSISTANT_LABEL[mode];
            console.log(`\n> ${speaker}: ${turn.content}`);
        }
    } else {
        const result = await chatService.sendMessage(mode, input);
        const text = result.ok ? result.reply : result.error.message;
        console.log(`\n> ${ASSISTANT_LABEL[mode]}: ${text}`);
    }
    return true;
}

function askQuestion() {
    rl.question(`\n[${mode}] > You: `, (line) => {
        handleLine(line)
            .then((keepGoing) => {
                if (keepGoing) {
                    askQuestion();
                } else {
                    console.log('Goodbye!');
                    rl.close();
                }
            })
            .catch((error: unknown) => {
                console.error('\n[Error]', error);
                askQuestion();
            });
    });
}

console.log('=============================================');
console.log('        QA Assistant - Terminal Chat         ');
console.log('=============================================');
printHelp();
askQuestion();
