// Player commands come from the input collaborator; the last two come from clocks
export type Command =
  | { kind: "MoveLeft" }
  | { kind: "MoveRight" }
  | { kind: "SoftDrop" }
  | { kind: "Rotate" }
  | { kind: "HardDrop" }
  | { kind: "TogglePause" }
  | { kind: "GravityTick" }
  | { kind: "CountdownExpired" };

export type CommandKind = Command["kind"];
