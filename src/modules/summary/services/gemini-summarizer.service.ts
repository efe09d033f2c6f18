import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pTimeout from 'p-timeout';
import { firstValueFrom } from 'rxjs';
import {
  MisconfiguredCredentialError,
  UpstreamUnavailableError,
} from '../../../common/errors/breach.errors';
import {
  ISummarizer,
  SummaryPrompt,
} from '../../../common/interfaces/summarizer.interface';

interface GenerateContentResponse {
  candidates?: {
    content?: { parts?: { text?: string }[] };
  }[];
}

@Injectable()
export class GeminiSummarizer implements ISummarizer {
  private readonly logger = new Logger(GeminiSummarizer.name);
  private readonly apiUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.apiUrl = this.configService.getOrThrow<string>('app.geminiApiUrl');
    this.model = this.configService.getOrThrow<string>('app.geminiModel');
    this.timeoutMs = this.configService.getOrThrow<number>(
      'app.summaryTimeoutMs',
    );
  }

  async summarize(prompt: SummaryPrompt): Promise<string> {
    const apiKey = this.configService.get<string>('app.googleApiKey');
    if (!apiKey) {
      this.logger.error('GOOGLE_API_KEY is not set');
      throw new MisconfiguredCredentialError();
    }

    const url = `${this.apiUrl}/models/${this.model}:generateContent`;
    let data: GenerateContentResponse;
    try {
      const response = await pTimeout(
        firstValueFrom(
          this.httpService.post<GenerateContentResponse>(
            url,
            {
              contents: [{ parts: [{ text: prompt.user }] }],
              systemInstruction: { parts: [{ text: prompt.system }] },
            },
            {
              headers: {
                'Content-Type': 'application/json',
                'x-goog-api-key': apiKey,
              },
              timeout: this.timeoutMs,
            },
          ),
        ),
        this.timeoutMs,
      );
      data = response.data;
    } catch (error) {
      this.logger.warn(`Gemini request failed: ${(error as Error).message}`);
      throw new UpstreamUnavailableError(
        `Error communicating with AI service: ${(error as Error).message}`,
      );
    }

    const text = (data.candidates?.[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('')
      .trim();
    if (!text) {
      this.logger.warn(`Gemini model ${this.model} returned no text`);
      throw new UpstreamUnavailableError('AI model returned empty response.');
    }
    return text;
  }
}
