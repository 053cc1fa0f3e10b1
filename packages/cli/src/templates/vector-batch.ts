export const vectorBatchTemplate = `version: "1"
width: 12cm
height: 4cm
scene:
  units: { x0: 0, y0: 0, width: 3, height: 1 }
  children:
    # One fill per circle
    - property: fill
      values: [tomato, gold, seagreen]
    - property: svg_class
      values: [first, second, third]
    - form: circle
      items:
        - { x: 0.5cx, y: 0.5cy, r: 0.4cy }
        - { x: 1.5cx, y: 0.5cy, r: 0.4cy }
        - { x: 2.5cx, y: 0.5cy, r: 0.4cy }
`;
