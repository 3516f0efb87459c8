import { IdentifierExtractor } from "../identifier-extractor";
import { MiddlewareConfigError } from "../errors";

const UUID_PATTERN =
  "([0-9a-z]{8}-[0-9a-z]{4}-[0-9a-z]{4}-[0-9a-z]{4}-[0-9a-z]{12})";

describe("IdentifierExtractor", () => {
  it("returns the first match in the path", () => {
    const extractor = new IdentifierExtractor(UUID_PATTERN);

    expect(extractor.extract("/v1/550e8400-e29b-41d4-a716-446655440000/items")).toBe(
      "550e8400-e29b-41d4-a716-446655440000"
    );
  });

  it("returns an empty string when nothing matches", () => {
    const extractor = new IdentifierExtractor(UUID_PATTERN);

    expect(extractor.extract("/v1/items")).toBe("");
  });

  it("returns the whole match rather than a capture group", () => {
    const extractor = new IdentifierExtractor("key-([0-9]+)");

    expect(extractor.extract("/a/key-42/b")).toBe("key-42");
  });

  it("is stable across repeated calls", () => {
    const extractor = new IdentifierExtractor("[0-9]+");

    expect(extractor.extract("/x/12")).toBe("12");
    expect(extractor.extract("/x/12")).toBe("12");
    expect(extractor.extract("/x/7")).toBe("7");
  });

  it("rejects an empty pattern", () => {
    expect(() => new IdentifierExtractor("")).toThrow(MiddlewareConfigError);
  });

  it("rejects an invalid pattern at construction", () => {
    expect(() => new IdentifierExtractor("([a-z")).toThrow(/invalid pattern/);
  });
});
