export const BID_LIST_PAGE = `<?xml version="1.0" encoding="UTF-8"?>
<GetMyeBayBuyingResponse xmlns="urn:ebay:apis:eBLBaseComponents">
  <Ack>Success</Ack>
  <BidList>
    <ItemArray>
      <Item>
        <ItemID>110001</ItemID>
        <Title>Vintage Camera</Title>
        <ListingType>Chinese</ListingType>
        <ListingDetails>
          <EndTime>2026-03-01T12:10:00.000Z</EndTime>
          <ViewItemURL>https://www.ebay.co.uk/itm/110001</ViewItemURL>
        </ListingDetails>
        <SellingStatus>
          <CurrentPrice currencyID="GBP">42.50</CurrentPrice>
          <BidCount>7</BidCount>
          <HighBidder><UserID>Test_Buyer</UserID></HighBidder>
        </SellingStatus>
        <Seller>
          <UserID>camera_shop</UserID>
          <FeedbackScore>1520</FeedbackScore>
          <PositiveFeedbackPercent>99.8</PositiveFeedbackPercent>
        </Seller>
        <PictureDetails><PictureURL>https://example.com/camera.jpg</PictureURL></PictureDetails>
        <ReserveMet>true</ReserveMet>
      </Item>
      <Item>
        <ItemID>110002</ItemID>
        <Title>Lens</Title>
        <ListingType>Chinese</ListingType>
        <SellingStatus>
          <CurrentPrice currencyID="GBP">10.00</CurrentPrice>
          <HighBidder><UserID>someone_else</UserID></HighBidder>
        </SellingStatus>
      </Item>
    </ItemArray>
    <PaginationResult>
      <TotalNumberOfPages>3</TotalNumberOfPages>
      <TotalNumberOfEntries>402</TotalNumberOfEntries>
    </PaginationResult>
  </BidList>
</GetMyeBayBuyingResponse>`;

export const buyingPage = (list: string, body: string, totalPages = 1): string => `<?xml version="1.0" encoding="UTF-8"?>
<GetMyeBayBuyingResponse xmlns="urn:ebay:apis:eBLBaseComponents">
  <Ack>Success</Ack>
  <${list}>
    ${body}
    <PaginationResult><TotalNumberOfPages>${totalPages}</TotalNumberOfPages></PaginationResult>
  </${list}>
</GetMyeBayBuyingResponse>`;

export const watchItem = (itemId: string, watchers = 3): string => `<ItemArray>
  <Item>
    <ItemID>${itemId}</ItemID>
    <Title>Watched ${itemId}</Title>
    <ListingType>FixedPriceItem</ListingType>
    <SellingStatus><CurrentPrice currencyID="EUR">5.00</CurrentPrice></SellingStatus>
    <WatchCount>${watchers}</WatchCount>
  </Item>
</ItemArray>`;

export const WON_LIST_BODY = `<OrderTransactionArray>
  <OrderTransaction>
    <Transaction>
      <Item>
        <ItemID>220001</ItemID>
        <Title>Boots</Title>
        <Seller><UserID>shoe_shop</UserID></Seller>
      </Item>
      <TransactionPrice currencyID="GBP">25.00</TransactionPrice>
      <ShippedTime>2026-02-27T10:00:00.000Z</ShippedTime>
    </Transaction>
  </OrderTransaction>
  <OrderTransaction>
    <Order>
      <OrderStatus>Shipped</OrderStatus>
      <ShippingDetails>
        <ShipmentTrackingDetails><ShipmentTrackingNumber>TRACK123</ShipmentTrackingNumber></ShipmentTrackingDetails>
      </ShippingDetails>
    </Order>
    <Transaction>
      <Item>
        <ItemID>220002</ItemID>
        <Title>Scarf</Title>
        <SellingStatus><CurrentPrice currencyID="GBP">8.00</CurrentPrice></SellingStatus>
      </Item>
    </Transaction>
  </OrderTransaction>
  <OrderTransaction>
    <Order><OrderStatus>Completed</OrderStatus></Order>
    <Transaction>
      <Item><ItemID>220003</ItemID><Title>Hat</Title></Item>
    </Transaction>
  </OrderTransaction>
  <OrderTransaction>
    <Transaction>
      <Item><ItemID>220004</ItemID><Title>Gloves</Title></Item>
    </Transaction>
  </OrderTransaction>
</OrderTransactionArray>`;

export const GET_USER_RESPONSE = `<?xml version="1.0" encoding="UTF-8"?>
<GetUserResponse xmlns="urn:ebay:apis:eBLBaseComponents">
  <Ack>Success</Ack>
  <User><UserID>test_buyer</UserID></User>
</GetUserResponse>`;

export const failure = (callName: string, code: string, message: string): string => `<?xml version="1.0" encoding="UTF-8"?>
<${callName}Response xmlns="urn:ebay:apis:eBLBaseComponents">
  <Ack>Failure</Ack>
  <Errors>
    <ShortMessage>Error</ShortMessage>
    <LongMessage>${message}</LongMessage>
    <ErrorCode>${code}</ErrorCode>
    <SeverityCode>Error</SeverityCode>
  </Errors>
</${callName}Response>`;
