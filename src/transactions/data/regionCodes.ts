// 서울특별시 시군구 코드 (법정동코드 앞 5자리)
export const REGION_CODE_MAP: Readonly<Record<string, string>> = Object.freeze({
  '11110': '서울특별시 종로구',
  '11140': '서울특별시 중구',
  '11170': '서울특별시 용산구',
  '11200': '서울특별시 성동구',
  '11215': '서울특별시 광진구',
  '11230': '서울특별시 동대문구',
  '11260': '서울특별시 중랑구',
  '11290': '서울특별시 성북구',
  '11305': '서울특별시 강북구',
  '11320': '서울특별시 도봉구',
  '11350': '서울특별시 노원구',
  '11380': '서울특별시 은평구',
  '11410': '서울특별시 서대문구',
  '11440': '서울특별시 마포구',
  '11470': '서울특별시 양천구',
  '11500': '서울특별시 강서구',
  '11530': '서울특별시 구로구',
  '11545': '서울특별시 금천구',
  '11560': '서울특별시 영등포구',
  '11590': '서울특별시 동작구',
  '11620': '서울특별시 관악구',
  '11650': '서울특별시 서초구',
  '11680': '서울특별시 강남구',
  '11710': '서울특별시 송파구',
  '11740': '서울특별시 강동구',
});
