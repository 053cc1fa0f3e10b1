export const basicTemplate = `version: "1"
width: 10cm
height: 10cm
scene:
  children:
    - property: stroke
      values: [black]
    - property: fill
      values: [null]
    - form: rectangle
      items:
        - { x: 0.1w, y: 0.1h, width: 0.8w, height: 0.8h }
    - context:
        box: [0.25w, 0.25h, 0.5w, 0.5h]
        children:
          - property: fill
            values: [steelblue]
          - form: circle
            items:
              - { x: 0.5w, y: 0.5h, r: 0.4w }
`;
