// lib/examples.ts
// Preloaded samples for the text tab.

export type TextExample = {
  id: string;
  label: string;
  text: string;
};

export const TEXT_EXAMPLES: TextExample[] = [
  {
    id: "lottery",
    label: "Lottery scam message",
    text:
      "CONGRATS! Your mobile number has won a ₹50,00,000 prize in the KBC Lottery! " +
      "To claim, transfer ₹5,000 processing fee immediately to UPI ID: prize-desk@examplebank. " +
      "Limited time offer! Call +910000000000 for details. SHARE THIS WITH 5 GROUPS!"
  },
  {
    id: "health-cure",
    label: "Viral health 'cure'",
    text:
      "BREAKING! Doctors HIDING this! Ayurvedic miracle herb 'Velvet Leaf' found in India " +
      "can CURE ALL types of cancer in 30 days! Research banned by big pharma. " +
      "Share before they delete this truth!"
  }
];
