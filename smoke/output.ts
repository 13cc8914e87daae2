import process from "node:process";

/** Everything the runner reports, passes and failures alike, goes to stdout. */
export interface Output {
    /** One line. */
    print(message: string): void;
    /** Raw text without a newline, used for progressive stream output. */
    write(text: string): void;
}

export const consoleOutput: Output = {
    print(message) {
        console.log(message);
    },
    write(text) {
        process.stdout.write(text);
    },
};
