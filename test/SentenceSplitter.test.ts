import { SentenceSplitter } from "../src/utils/tts/SentenceSplitter";
import { detectPhoneNumber } from "../src/utils/phone";

describe("SentenceSplitter", () => {
    it("splits at terminal punctuation followed by whitespace", () => {
        expect(SentenceSplitter.split("The fee is 1 lakh. Hostel is separate! Anything else?")).toEqual([
            "The fee is 1 lakh.",
            "Hostel is separate!",
            "Anything else?",
        ]);
    });

    it("does not split inside numbers or at a trailing period", () => {
        expect(SentenceSplitter.split("The closing merit was 78.4 percent.")).toEqual([
            "The closing merit was 78.4 percent.",
        ]);
    });

    it("returns a reply without punctuation as one sentence", () => {
        expect(SentenceSplitter.split("  yes we offer that  ")).toEqual(["yes we offer that"]);
    });

    it("drops empty fragments", () => {
        expect(SentenceSplitter.split("   ")).toEqual([]);
        expect(SentenceSplitter.split("One.\n\n  Two.")).toEqual(["One.", "Two."]);
    });
});

describe("detectPhoneNumber", () => {
    it("finds a local mobile number inside a sentence", () => {
        expect(detectPhoneNumber("my number is 03001234567")).toBe("03001234567");
    });

    it("reads numbers spoken in groups", () => {
        expect(detectPhoneNumber("it is 0300 123 4567")).toBe("03001234567");
        expect(detectPhoneNumber("0300-1234567 please")).toBe("03001234567");
    });

    it("ignores short digit runs", () => {
        expect(detectPhoneNumber("my marks are 1030 out of 1100")).toBeNull();
    });
});
