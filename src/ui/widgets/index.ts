/**
 * UI Widgets
 *
 * Leaf elements of the element tree.
 */

export { Label, type LabelOptions } from "./Label";
export { Button, type ButtonOptions } from "./Button";
export { Checkbox, type CheckboxOptions } from "./Checkbox";
export { RadioButton, type RadioButtonOptions } from "./RadioButton";
export { Slider, type SliderOptions } from "./Slider";
export { Dropdown, DEFAULT_PLACEHOLDER, type DropdownOptions } from "./Dropdown";
export { TextEntry, type TextEntryOptions } from "./TextEntry";
export { NumericField, DEFAULT_NUMERIC_MAX, type NumericFieldOptions } from "./NumericField";
export { Line, MIN_LINE_THICKNESS, type LineOptions, type LineOrientation } from "./Line";
export { Empty, EMPTY_SIZE } from "./Empty";
