import OpenAI from "openai";
import { ImageAnalysis, ImageAnalyzer } from "imagesmith/analysis/ImageAnalyzer";

const analysisPrompt =
  "Analyze this image and provide: 1) Description of main subjects, 2) Color analysis, 3) Suggested improvements, " +
  "4) Best format recommendations. Respond in JSON format.";

export class OpenAIImageAnalyzer implements ImageAnalyzer {
  private readonly maxTokens = 1000;

  constructor(private readonly client: OpenAI, private readonly model: string) {}

  async analyze(jpegDataUri: string): Promise<ImageAnalysis> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: analysisPrompt },
            { type: "image_url", image_url: { url: jpegDataUri } }
          ]
        }
      ]
    });
    return ImageAnalysis.fromReply(response.choices[0]?.message.content ?? "");
  }
}
