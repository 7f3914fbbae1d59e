import { Lexer } from "./Lexer.js";
import { LexerError } from "./LexerError.js";
import { Token, TokenType } from "./Token.js";
import { tokenToString } from "./formatToken.js";

function tokenize(input: string): Token[] {
    const lexer = new Lexer("test.asm", input);
    const tokens: Token[] = [];
    while (true) {
        const tok = lexer.nextNonBlank();
        tokens.push(tok);
        if (tok.type == TokenType.EOF) {
            return tokens;
        }
    }
}

describe("GIVEN a lexer", () => {
    describe("WHEN scanning a labeled statement", () => {
        const tokens = tokenize("LBL      DC    C'IT''S',L'BUF\n");

        test("THEN it should produce the expected token types", () => {
            expect(tokens.map(t => t.type)).toEqual([
                TokenType.Symbol, TokenType.Symbol, TokenType.Symbol, TokenType.String,
                TokenType.Char, TokenType.Attribute, TokenType.Symbol,
                TokenType.EOL, TokenType.EOF,
            ]);
        });

        test("THEN doubled quotes should collapse", () => {
            const str = tokens[3];
            expect(str.type == TokenType.String && str.str).toEqual("IT'S");
        });

        test("THEN the attribute should be recognized", () => {
            const attr = tokens[5];
            expect(attr.type == TokenType.Attribute && attr.attribute).toEqual("L");
        });

        test("THEN tokens should carry their columns", () => {
            expect(tokens[1].extent.cursor.colIdx).toEqual(9);
            expect(tokens[1].extent.width).toEqual(2);
        });
    });

    describe("WHEN scanning a line with an asterisk in the first column", () => {
        const tokens = tokenize("* just a remark\n         DC    A(*)");

        test("THEN the whole line should be a remark", () => {
            const remark = tokens[0];
            expect(remark.type == TokenType.Remark && remark.remark).toEqual("* just a remark");
        });

        test("THEN an asterisk in the operand field should be a character", () => {
            expect(tokens.map(t => tokenToString(t)).slice(4, 7)).toEqual(["Char('(')", "Char('*')", "Char(')')"]);
        });
    });

    describe("WHEN scanning a CRLF line ending", () => {
        const lexer = new Lexer("test.asm", "A\r\nB");

        test("THEN the source line should not contain the carriage return", () => {
            expect(lexer.getLine(0)).toEqual("A");
            expect(lexer.getLine(1)).toEqual("B");
        });
    });

    describe("WHEN scanning invalid input", () => {
        test("THEN an unterminated string should fail", () => {
            expect(() => tokenize("X  C'ABC\n")).toThrow(LexerError);
        });

        test("THEN an unknown character should fail with its position", () => {
            try {
                tokenize("X  ~");
                expect.unreachable();
            } catch (e) {
                expect(e).toBeInstanceOf(LexerError);
                if (e instanceof LexerError) {
                    expect(e.message).toEqual("Unexpected character '~'");
                    expect(e.line).toEqual(1);
                    expect(e.col).toEqual(4);
                }
            }
        });

        test("THEN a symbol that is too long should fail", () => {
            expect(() => tokenize("A".repeat(64))).toThrow("Symbol longer than 63 characters");
        });
    });
});
