import { PassThrough } from "stream";
import { ReadlinePrompt, StaticPrompt } from "../../src/execution/ConfirmationPrompt.js";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("ReadlinePrompt", () => {
    let input: PassThrough;
    let output: PassThrough;
    let written: string;

    beforeEach(() => {
        input = new PassThrough();
        output = new PassThrough();
        written = "";
        output.on("data", (chunk: Buffer) => {
            written += chunk.toString();
        });
    });

    it("should accept yes and y", async () => {
        const prompt = new ReadlinePrompt(input, output);

        const first = prompt.confirm("BUY 10 IBIT");
        input.write("yes\n");
        await expect(first).resolves.toBe(true);

        const second = prompt.confirm("BUY 10 IBIT");
        input.write(" Y \n");
        await expect(second).resolves.toBe(true);
    });

    it("should treat any other answer as a rejection", async () => {
        const prompt = new ReadlinePrompt(input, output);

        const answer = prompt.confirm("BUY 10 IBIT");
        input.write("maybe\n");
        await expect(answer).resolves.toBe(false);
    });

    it("should ask concurrent confirmations one at a time", async () => {
        const prompt = new ReadlinePrompt(input, output);
        let secondSettled = false;

        const first = prompt.confirm("[BTC] BUY 10 IBIT");
        const second = prompt.confirm("[ETH] BUY 20 FETH").then((answer) => {
            secondSettled = true;
            return answer;
        });

        await flush();
        expect(written).toContain("[BTC] BUY 10 IBIT");
        expect(written).not.toContain("[ETH] BUY 20 FETH");

        input.write("yes\n");
        await expect(first).resolves.toBe(true);
        await flush();
        expect(secondSettled).toBe(false);
        expect(written).toContain("[ETH] BUY 20 FETH");

        input.write("no\n");
        await expect(second).resolves.toBe(false);
    });
});

describe("StaticPrompt", () => {
    it("should record summaries and return its fixed answer", async () => {
        const prompt = new StaticPrompt(false);

        await expect(prompt.confirm("SELL 5 IBIT")).resolves.toBe(false);
        expect(prompt.summaries).toEqual(["SELL 5 IBIT"]);
    });
});
