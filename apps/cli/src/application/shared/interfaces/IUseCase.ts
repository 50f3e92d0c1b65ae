/**
 * One command-level operation: generate, list or show. Commands call
 * `execute` and leave error reporting to the CLI.
 */
export interface IUseCase<TRequest, TResponse> {
  execute(request: TRequest): Promise<TResponse>;
}
