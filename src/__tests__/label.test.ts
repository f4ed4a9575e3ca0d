import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { PARAGRAPH_BREAK, decodeEntities, extractLabelText, joinChunks, labelChunks } from "../compiler/label.js";

describe("label text extraction", () => {
  it("returns plain labels trimmed and decoded", () => {
    assert.equal(extractLabelText("  Jane Doe "), "Jane Doe");
    assert.equal(extractLabelText("Smith &amp; Sons"), "Smith & Sons");
  });

  it("returns the text of a single block verbatim", () => {
    assert.equal(extractLabelText("<div>rico:Person</div>"), "rico:Person");
  });

  it("drops inline markup", () => {
    assert.equal(extractLabelText("<b>Jane</b> <i>Doe</i>"), "Jane Doe");
    assert.equal(extractLabelText('<span style="color: red">Oslo</span>'), "Oslo");
  });

  it("concatenates consecutive non-empty lines", () => {
    assert.equal(extractLabelText("First<div>Second</div>"), "FirstSecond");
  });

  it("ignores a single empty line between lines", () => {
    assert.equal(extractLabelText("A<div><br></div><div>B</div>"), "AB");
  });

  it("collapses two empty lines into one paragraph break", () => {
    const raw = "First<div>Second</div><div><br></div><div><br></div><div>Third</div>";
    assert.equal(extractLabelText(raw), `FirstSecond${PARAGRAPH_BREAK}Third`);
  });

  it("emits one paragraph break for a longer run of empty lines", () => {
    const raw = "<div>One</div><div><br></div><div><br></div><div><br></div><div>Two</div>";
    assert.equal(extractLabelText(raw), "One\n\nTwo");
  });

  it("does not start with a paragraph break", () => {
    assert.equal(extractLabelText("<div><br></div><div><br></div><div>Text</div>"), "Text");
  });

  it("treats non-breaking spaces as blank lines", () => {
    assert.equal(extractLabelText("<div>One</div><div>&nbsp;</div><div>&nbsp;</div><div>Two</div>"), "One\n\nTwo");
  });

  it("returns an empty string for an empty label", () => {
    assert.equal(extractLabelText(""), "");
    assert.equal(extractLabelText("<div><br></div>"), "");
  });

  it("keeps state local to each call", () => {
    assert.equal(extractLabelText("<div>Left</div>"), "Left");
    assert.equal(extractLabelText("<div>Right</div>"), "Right");
  });
});

describe("label chunks", () => {
  it("records an empty chunk for a block holding only a break", () => {
    assert.deepEqual(labelChunks("A<div><br></div><div>B</div>"), ["A", "", "B"]);
  });

  it("does not split on nested blocks", () => {
    assert.deepEqual(labelChunks("<div><div>A</div></div>"), ["A"]);
  });

  it("joins chunks with one break per run of empty chunks", () => {
    assert.equal(joinChunks(["a", "", "", "b", "", "", "", "c"]), "a\n\nb\n\nc");
  });
});

describe("entity decoding", () => {
  it("decodes named and numeric references", () => {
    assert.equal(decodeEntities("&lt;a&gt; &quot;b&quot; &#39;c&#39; &#xa;"), "<a> \"b\" 'c' \n");
  });

  it("leaves unknown entities untouched", () => {
    assert.equal(decodeEntities("&bogus;"), "&bogus;");
  });
});
