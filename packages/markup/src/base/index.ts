export {
  MarkupObject,
  renderValue,
  type MarkupObjectOptions,
  type Renderable,
  type Stringifiable,
} from "./markup-object.js";
export {
  Parameters,
  Options,
  Arguments,
  type ParameterValue,
  type ParameterInput,
  type KeyedValues,
} from "./parameters.js";
export {
  Command,
  toArguments,
  toOptions,
  type ArgumentsInput,
  type OptionsInput,
} from "./command.js";
export {
  Container,
  Environment,
  EnvironmentFrame,
  type ContainerOptions,
  type EnvironmentOptions,
  type EnvironmentFrameOptions,
  type ContentItem,
} from "./containers.js";
