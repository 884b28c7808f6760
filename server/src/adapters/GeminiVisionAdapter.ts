import { GenerateContentParameters, GoogleGenAI } from '@google/genai';
import { ImageInput, VisionModel } from './ProviderAdapters';
import { env } from '../config/env';

/** The slice of the @google/genai `models` module this adapter calls. */
export interface GenerateContentClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export class GeminiVisionAdapter implements VisionModel {
  private readonly models: GenerateContentClient;

  constructor(
    apiKey = env.AI_STUDIO_KEY,
    private readonly model = env.VISION_MODEL,
    models?: GenerateContentClient,
  ) {
    this.models = models ?? new GoogleGenAI({ apiKey }).models;
  }

  async describeImage(prompt: string, image: ImageInput): Promise<string> {
    const response = await this.models.generateContent({
      model: this.model,
      contents: [
        {
          role: 'user',
          parts: [
            { text: prompt },
            { inlineData: { mimeType: image.mimeType, data: image.data.toString('base64') } },
          ],
        },
      ],
    });

    const text = response.text;
    if (!text) {
      throw new Error('Vision model returned an empty response');
    }
    return text;
  }
}
