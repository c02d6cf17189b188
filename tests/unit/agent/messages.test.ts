import { SUPPORTED_LANGUAGES } from "@/lib/agent/language";
import {
  buildAbandonedText,
  buildBusyText,
  buildClarificationText,
  buildCompletionText,
  buildFailureText,
  buildRetryText,
  messagesFor,
} from "@/lib/agent/messages";
import { makeTradeData } from "../../helpers/trades";

describe("buildClarificationText", () => {
  it("asks for a single field", () => {
    expect(buildClarificationText(["unitPrice"], "en")).toBe("Please tell me the price per unit.");
  });

  it("lists several fields in the order given", () => {
    expect(buildClarificationText(["quantity", "unit", "unitPrice"], "en")).toBe(
      "Please tell me the quantity, unit and price per unit."
    );
  });

  it("uses the user's language", () => {
    expect(buildClarificationText(["unitPrice"], "hi")).toBe("कृपया प्रति इकाई भाव बताइए।");
    expect(buildClarificationText(["quantity", "unitPrice"], "hi")).toBe("कृपया मात्रा और प्रति इकाई भाव बताइए।");
  });

  it("names exactly the requested fields and no others", () => {
    const text = buildClarificationText(["productName"], "en");
    const labels = messagesFor("en").fieldLabels;

    expect(text).toContain(labels.productName);
    expect(text).not.toContain(labels.quantity);
    expect(text).not.toContain(labels.unitPrice);
  });
});

describe("localized templates", () => {
  it.each(SUPPORTED_LANGUAGES.map((code) => [code]))("are complete for %s", (code) => {
    const m = messagesFor(code);

    expect(m.clarify).toContain("{fields}");
    expect(m.completed).toContain("{total}");
    expect(m.completed).toContain("{cess}");
    expect(m.retry.length).toBeGreaterThan(0);
    expect(m.failed.length).toBeGreaterThan(0);
    expect(m.busy.length).toBeGreaterThan(0);
    expect(m.abandoned.length).toBeGreaterThan(0);
    expect(Object.keys(m.fieldLabels).sort()).toEqual(["productName", "quantity", "unit", "unitPrice"]);
  });

  it("keeps retry and failure messages distinct", () => {
    expect(buildRetryText("en")).toBe("Sorry, I could not understand that. Please repeat the trade details.");
    expect(buildFailureText("en")).toBe(
      "Sorry, this trade could not be recorded automatically. Please enter the details manually."
    );
  });

  it("localizes the busy and abandoned replies", () => {
    expect(buildBusyText("hi")).toBe("कृपया एक क्षण रुकिए, आपकी पिछली बात पर काम चल रहा है।");
    expect(buildAbandonedText("en")).toBe("This trade was abandoned. Nothing was recorded.");
    expect(buildAbandonedText("ta")).toBe("இந்த வியாபாரம் கைவிடப்பட்டது. எதுவும் பதிவு செய்யப்படவில்லை.");
  });
});

describe("buildCompletionText", () => {
  it("carries product, quantity, unit price, total and cess", () => {
    expect(buildCompletionText(makeTradeData(), "en")).toBe(
      "Trade recorded: wheat, 2 quintal at ₹2000.00 per quintal. Total ₹4000.00, mandi cess ₹200.00."
    );
  });
});
