import type {
  AnalystRequest,
  AnalystResponse,
  CortexClient,
  SearchRequest,
  SearchResponse,
} from '../../cortex/cortex-client.js';

export class FakeCortex implements CortexClient {
  readonly searches: SearchRequest[] = [];
  readonly questions: AnalystRequest[] = [];
  searchResult: SearchResponse | Error = { results: [] };
  analystResult: AnalystResponse | Error = { text: '', suggestions: [], warnings: [] };

  async search(request: SearchRequest): Promise<SearchResponse> {
    this.searches.push(request);
    if (this.searchResult instanceof Error) {
      throw this.searchResult;
    }
    return this.searchResult;
  }

  async analyst(request: AnalystRequest): Promise<AnalystResponse> {
    this.questions.push(request);
    if (this.analystResult instanceof Error) {
      throw this.analystResult;
    }
    return this.analystResult;
  }
}
