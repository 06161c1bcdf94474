export interface Greeter {
  message(): string;
  greet(name: string): string;
}

export function createGreeter(): Greeter {
  return {
    message: () => "Hello from qmlterm",
    greet: (name: string) => {
      const trimmed = name.trim();
      return trimmed ? `Hello, ${trimmed}!` : "Hello, terminal!";
    },
  };
}
